import {
  advancePlayer,
  createCollisionGrid,
  createPlayer,
  createPlayerStatus,
  IDLE_INPUT,
  type CollisionWorld,
  type FrameInput,
  type PlayerStatus,
} from '@lh/engine';
import type { LevelT, PhysicsConfigT, PlayerEntityT } from '@lh/level-spec';

/** Each search action is held for this many fixed ticks. */
export const TICKS_PER_ACTION = 2;
/** Nodes further than this behind the furthest footing reached are dropped. */
const BACKTRACK_LIMIT_PX = 200;

interface Action {
  name: string;
  input: FrameInput;
}

interface SearchNode {
  player: PlayerEntityT;
  status: PlayerStatus;
  g: number;
  f: number;
  parent?: SearchNode;
  action?: Action;
}

export interface SearchOptions {
  physics: PhysicsConfigT;
  timeLimitMs: number;
  maxNodes: number;
}

export type SearchFailReason = 'timeout' | 'node_limit' | 'no_path';

export interface SearchOutcome {
  ok: boolean;
  reason?: SearchFailReason;
  /** One input per tick, from the level start to the goal. */
  path?: FrameInput[];
  actions?: string[];
  nodesExpanded: number;
  visitedStates: number;
  durationMs: number;
}

const ACTIONS: Action[] = [
  { name: 'idle', input: IDLE_INPUT },
  { name: 'left', input: { ...IDLE_INPUT, left: true } },
  { name: 'right', input: { ...IDLE_INPUT, right: true } },
  { name: 'jump', input: { ...IDLE_INPUT, jump: true, jumpPressed: true } },
  { name: 'left_jump', input: { ...IDLE_INPUT, left: true, jump: true, jumpPressed: true } },
  { name: 'right_jump', input: { ...IDLE_INPUT, right: true, jump: true, jumpPressed: true } },
];

/** Platforms and the goal only; enemies and pickups do not block the route. */
export function searchWorld(level: LevelT): CollisionWorld {
  return { bounds: { ...level.bounds }, grid: createCollisionGrid([...level.platforms, level.goal]) };
}

function quantise(value: number, stepSize: number): number {
  return Math.round(value / stepSize) * stepSize;
}

function stateKey(player: PlayerEntityT): string {
  const x = quantise(player.position.x, 2);
  const y = quantise(player.position.y, 2);
  const vx = quantise(player.velocity.x, 0.5);
  const vy = quantise(player.velocity.y, 0.5);
  return `${x}|${y}|${vx}|${vy}|${player.grounded ? 1 : 0}`;
}

/** Remaining ticks at full speed; actions cost one, so this leans greedy. */
function heuristic(player: PlayerEntityT, goalX: number, physics: PhysicsConfigT): number {
  const dx = Math.max(0, goalX - (player.position.x + player.hitbox.offsetX + player.hitbox.width));
  return dx / physics.maxSpeedX;
}

/** Inputs for each tick of an action; the jump edge only fires on the first. */
function ticksOf(action: Action): FrameInput[] {
  const ticks: FrameInput[] = [action.input];
  for (let index = 1; index < TICKS_PER_ACTION; index += 1) {
    ticks.push({ ...action.input, jumpPressed: false });
  }
  return ticks;
}

/**
 * Furthest x the search has stood on. Airborne nodes may be falling past the
 * platforms, so only grounded ones move it.
 */
export function advanceFrontier(bestX: number, player: PlayerEntityT): number {
  return player.grounded ? Math.max(bestX, player.position.x) : bestX;
}

interface Advance {
  player: PlayerEntityT;
  status: PlayerStatus;
  reachedGoal: boolean;
}

function advance(node: SearchNode, inputs: FrameInput[], world: CollisionWorld, physics: PhysicsConfigT): Advance {
  let player = node.player;
  let status = node.status;
  let reachedGoal = false;
  for (const input of inputs) {
    const step = advancePlayer(player, status, input, { physics, world });
    player = step.player;
    status = step.status;
    reachedGoal = reachedGoal || step.events.some((event) => event.type === 'GoalReached');
    if (reachedGoal) {
      break;
    }
  }
  return { player, status, reachedGoal };
}

function reconstructPath(node: SearchNode): Action[] {
  const actions: Action[] = [];
  let current: SearchNode | undefined = node;
  while (current && current.parent && current.action) {
    actions.push(current.action);
    current = current.parent;
  }
  actions.reverse();
  return actions;
}

class PriorityQueue {
  private heap: SearchNode[] = [];

  push(node: SearchNode) {
    this.heap.push(node);
    this.bubbleUp(this.heap.length - 1);
  }

  pop(): SearchNode | undefined {
    if (this.heap.length === 0) {
      return undefined;
    }
    const first = this.heap[0];
    const last = this.heap.pop();
    if (!last) {
      return first;
    }
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.bubbleDown(0);
    }
    return first;
  }

  get length(): number {
    return this.heap.length;
  }

  private bubbleUp(index: number) {
    let current = index;
    while (current > 0) {
      const parent = Math.floor((current - 1) / 2);
      if (this.heap[current].f >= this.heap[parent].f) {
        break;
      }
      [this.heap[current], this.heap[parent]] = [this.heap[parent], this.heap[current]];
      current = parent;
    }
  }

  private bubbleDown(index: number) {
    let current = index;
    const length = this.heap.length;
    while (true) {
      const left = current * 2 + 1;
      const right = left + 1;
      let smallest = current;
      if (left < length && this.heap[left].f < this.heap[smallest].f) {
        smallest = left;
      }
      if (right < length && this.heap[right].f < this.heap[smallest].f) {
        smallest = right;
      }
      if (smallest === current) {
        break;
      }
      [this.heap[current], this.heap[smallest]] = [this.heap[smallest], this.heap[current]];
      current = smallest;
    }
  }
}

/**
 * Best-first search over the engine's own player step and collision
 * resolution, looking for an input sequence that touches the goal.
 */
export function searchLevel(level: LevelT, options: SearchOptions): SearchOutcome {
  const { physics } = options;
  const world = searchWorld(level);
  const worldBottom = level.bounds.y + level.bounds.height;
  const goalX = level.goal.position.x;
  const start = createPlayer(level.start);

  const startNode: SearchNode = {
    player: start,
    status: createPlayerStatus(),
    g: 0,
    f: heuristic(start, goalX, physics),
  };
  const open = new PriorityQueue();
  open.push(startNode);

  const visited = new Map<string, number>();
  visited.set(stateKey(start), 0);

  const startTime = Date.now();
  const elapsed = () => Date.now() - startTime;
  let nodesExpanded = 0;
  let bestX = start.position.x;

  while (open.length > 0) {
    if (elapsed() > options.timeLimitMs) {
      return { ok: false, reason: 'timeout', nodesExpanded, visitedStates: visited.size, durationMs: elapsed() };
    }
    if (nodesExpanded >= options.maxNodes) {
      return { ok: false, reason: 'node_limit', nodesExpanded, visitedStates: visited.size, durationMs: elapsed() };
    }

    const current = open.pop();
    if (!current) {
      break;
    }
    nodesExpanded += 1;
    bestX = advanceFrontier(bestX, current.player);

    for (const action of ACTIONS) {
      const next = advance(current, ticksOf(action), world, physics);
      const node: SearchNode = {
        player: next.player,
        status: next.status,
        g: current.g + 1,
        f: 0,
        parent: current,
        action,
      };

      if (next.reachedGoal) {
        const actions = reconstructPath(node);
        return {
          ok: true,
          path: actions.flatMap(ticksOf),
          actions: actions.map((entry) => entry.name),
          nodesExpanded,
          visitedStates: visited.size,
          durationMs: elapsed(),
        };
      }

      if (next.player.position.y > worldBottom || next.player.position.x < bestX - BACKTRACK_LIMIT_PX) {
        continue;
      }

      const key = stateKey(next.player);
      const previousCost = visited.get(key);
      if (previousCost !== undefined && previousCost <= node.g) {
        continue;
      }
      visited.set(key, node.g);
      node.f = node.g + heuristic(next.player, goalX, physics);
      open.push(node);
    }
  }

  return { ok: false, reason: 'no_path', nodesExpanded, visitedStates: visited.size, durationMs: elapsed() };
}

/** Plays a tick-by-tick input sequence from the level start and reports whether it touches the goal. */
export function replayPath(level: LevelT, path: FrameInput[], physics: PhysicsConfigT): boolean {
  const world = searchWorld(level);
  let player = createPlayer(level.start);
  let status = createPlayerStatus();
  for (const input of path) {
    const step = advancePlayer(player, status, input, { physics, world });
    if (step.events.some((event) => event.type === 'GoalReached')) {
      return true;
    }
    player = step.player;
    status = step.status;
  }
  return false;
}
