/**
 * Pathfinding and reachability over the movement-blocking graph.
 *
 * Two cells are connected when a single step between them is unobstructed
 * (see moveBlocked). Every step costs 1 unless a cost function says otherwise.
 *
 * @module spatial/pathfinding
 */

import type { Point } from '../../schema/grid.js';
import { createTimer, logger } from '../../utils/logger.js';
import { isBlockedAlong } from './blocking.js';
import { NEIGHBOR_OFFSETS } from './constants.js';
import { addPos, distance, posKey, samePos } from './geometry.js';
import { MinHeap } from './heap.js';
import type { GridMap } from './map.js';

const log = logger.child('Pathfinding');

/** Cost of stepping from `from` to the adjacent `to` */
export type StepCostFn = (from: Point, to: Point, map: GridMap) => number;

/** Estimated remaining cost from `pos` to `goal` */
export type HeuristicFn = (pos: Point, goal: Point, map: GridMap) => number;

export interface PathOptions {
    /** Neighbors farther than this from the start are never entered */
    maxRadius?: number;
    cost?: StepCostFn;
    heuristic?: HeuristicFn;
}

/**
 * Cells one unobstructed step away, in NEIGHBOR_OFFSETS order
 */
export function reachableNeighbors(map: GridMap, pos: Point): Point[] {
    const result: Point[] = [];

    for (const delta of NEIGHBOR_OFFSETS) {
        if (!isBlockedAlong(map, pos, delta.x, delta.y)) {
            result.push(addPos(pos, delta));
        }
    }

    return result;
}

function boundedNeighbors(map: GridMap, start: Point, pos: Point, maxRadius?: number): Point[] {
    const neighbors = reachableNeighbors(map, pos);
    if (maxRadius === undefined) {
        return neighbors;
    }
    return neighbors.filter(next => distance(start, next) <= maxRadius);
}

/**
 * A* search from `start` to `goal`.
 *
 * @returns the path including both ends, `[start]` when they coincide, or an
 * empty array when the goal cannot be reached
 *
 * Complexity: O(V log V) for V cells searched; unbounded searches may visit the whole map
 */
export function shortestPath(map: GridMap, start: Point, goal: Point, options: PathOptions = {}): Point[] {
    const { maxRadius, cost, heuristic } = options;
    const stepCost: StepCostFn = cost ?? (() => 1);
    const estimate: HeuristicFn = heuristic ?? ((pos, target) => distance(pos, target));

    log.debug('Searching', { from: posKey(start), to: posKey(goal), maxRadius: maxRadius ?? 'none' });
    const timer = createTimer(log);

    const open = new MinHeap<Point>(posKey);
    const gScore = new Map<string, number>([[posKey(start), 0]]);
    const cameFrom = new Map<string, Point>();

    open.insert(start, estimate(start, goal, map));

    while (!open.isEmpty()) {
        const current = open.extractMin();
        if (current === undefined) break;

        if (samePos(current, goal)) {
            const path = reconstructPath(cameFrom, current);
            timer.done('Path found', { cells: path.length });
            return path;
        }

        const currentScore = gScore.get(posKey(current)) ?? Infinity;

        for (const next of boundedNeighbors(map, start, current, maxRadius)) {
            const tentative = currentScore + stepCost(current, next, map);
            const key = posKey(next);

            if (tentative < (gScore.get(key) ?? Infinity)) {
                cameFrom.set(key, current);
                gScore.set(key, tentative);
                open.insert(next, tentative + estimate(next, goal, map));
            }
        }
    }

    timer.done('No path found');
    return [];
}

function reconstructPath(cameFrom: Map<string, Point>, end: Point): Point[] {
    const path: Point[] = [end];
    let current = cameFrom.get(posKey(end));

    while (current !== undefined) {
        path.unshift(current);
        current = cameFrom.get(posKey(current));
    }

    return path;
}

/**
 * Breadth-first expansion up to `radius` hops through the blocking graph.
 * The result starts with `origin`, holds each cell once, and is in discovery order.
 */
export function floodFill(map: GridMap, origin: Point, radius: number): Point[] {
    const flood: Point[] = [origin];
    const seen = new Set<string>([posKey(origin)]);
    let frontier: Point[] = [origin];

    for (let hop = 0; hop < radius && frontier.length > 0; hop++) {
        const next: Point[] = [];

        for (const pos of frontier) {
            for (const neighbor of boundedNeighbors(map, origin, pos, radius)) {
                const key = posKey(neighbor);
                if (!seen.has(key)) {
                    seen.add(key);
                    next.push(neighbor);
                    flood.push(neighbor);
                }
            }
        }

        frontier = next;
    }

    log.debug('Flood fill done', { origin: posKey(origin), radius, cells: flood.length });
    return flood;
}
