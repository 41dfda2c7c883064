import type { Direction, DirectionName } from '../types/models.js';

/**
 * The eight search directions in canonical order.
 */
export const DIRECTIONS: readonly Direction[] = [
    { name: 'left-to-right', code: 'LR', dRow: 0, dCol: 1 },
    { name: 'right-to-left', code: 'RL', dRow: 0, dCol: -1 },
    { name: 'up', code: 'U', dRow: -1, dCol: 0 },
    { name: 'down', code: 'D', dRow: 1, dCol: 0 },
    { name: 'up-diagonal-left', code: 'DUL', dRow: -1, dCol: -1 },
    { name: 'up-diagonal-right', code: 'DUR', dRow: -1, dCol: 1 },
    { name: 'down-diagonal-left', code: 'DDL', dRow: 1, dCol: -1 },
    { name: 'down-diagonal-right', code: 'DDR', dRow: 1, dCol: 1 },
];

/**
 * Direction names in canonical order.
 */
export const DIRECTION_NAMES = [
    'left-to-right',
    'right-to-left',
    'up',
    'down',
    'up-diagonal-left',
    'up-diagonal-right',
    'down-diagonal-left',
    'down-diagonal-right',
] as const satisfies readonly DirectionName[];

const BY_NAME = new Map<DirectionName, Direction>(DIRECTIONS.map((d) => [d.name, d]));

/**
 * Look up a direction by name.
 */
export function getDirection(name: DirectionName): Direction {
    const direction = BY_NAME.get(name);
    if (!direction) {
        throw new Error(`Unknown direction: ${name}`);
    }
    return direction;
}
