export const THEME_NAMES = ['dawn', 'noon', 'dusk', 'storm', 'night'] as const;

export type ThemeName = (typeof THEME_NAMES)[number];

export interface ThemeParams {
  palette: {
    sky: number;
    platform: number;
    enemy: number;
    accent: number;
  };
  parallaxLayers: number;
  backdrop: string;
}

export interface ThemeEntry {
  theme: ThemeName;
  params: ThemeParams;
}

const THEMES: ThemeEntry[] = [
  {
    theme: 'dawn',
    params: {
      palette: {
        sky: 0xfde2c8,
        platform: 0x6b8e4e,
        enemy: 0xc2410c,
        accent: 0xfbbf24,
      },
      parallaxLayers: 2,
      backdrop: 'hills-dawn',
    },
  },
  {
    theme: 'noon',
    params: {
      palette: {
        sky: 0xbfe4ff,
        platform: 0x347355,
        enemy: 0xdc2626,
        accent: 0x1d4ed8,
      },
      parallaxLayers: 3,
      backdrop: 'hills-noon',
    },
  },
  {
    theme: 'dusk',
    params: {
      palette: {
        sky: 0xf0a17a,
        platform: 0x7c4a2d,
        enemy: 0x7e22ce,
        accent: 0xf97316,
      },
      parallaxLayers: 3,
      backdrop: 'cliffs-dusk',
    },
  },
  {
    theme: 'storm',
    params: {
      palette: {
        sky: 0x4b5563,
        platform: 0x374151,
        enemy: 0xfacc15,
        accent: 0x38bdf8,
      },
      parallaxLayers: 4,
      backdrop: 'cliffs-storm',
    },
  },
  {
    theme: 'night',
    params: {
      palette: {
        sky: 0x0f172a,
        platform: 0x1e3a8a,
        enemy: 0xf472b6,
        accent: 0xa5b4fc,
      },
      parallaxLayers: 2,
      backdrop: 'spires-night',
    },
  },
];

function copyEntry(entry: ThemeEntry): ThemeEntry {
  return {
    theme: entry.theme,
    params: {
      palette: { ...entry.params.palette },
      parallaxLayers: entry.params.parallaxLayers,
      backdrop: entry.params.backdrop,
    },
  };
}

export function getTheme(name: ThemeName): ThemeEntry {
  const entry = THEMES.find((candidate) => candidate.theme === name) ?? THEMES[0];
  return copyEntry(entry);
}

export function listThemes(): ThemeEntry[] {
  return THEMES.map(copyEntry);
}

/** Maps a roll in [0, 1) onto a theme name; out-of-range rolls are clamped. */
export function pickTheme(roll: number): ThemeName {
  const safe = Number.isFinite(roll) ? Math.min(Math.max(roll, 0), 0.999999) : 0;
  return THEME_NAMES[Math.floor(safe * THEME_NAMES.length)];
}
