import type { Gear, TeleopKey } from '../kernel/types';

// ── Key effects ───────────────────────────────────────────────────────────────
//
// Each key resolves to one small descriptor that press and release evaluate
// the same way:
//   axis      press sets group[axis] = sign · gear · unit, release zeroes it
//   gear      release selects the gear for later presses
//   modifier  press/release tracks modifierHeld
//   fire      press fires the blaster
//   quit      press with modifier held ends the session

export type AxisGroup = 'chassis' | 'gimbal';

export type KeyEffect =
    | { kind: 'axis'; group: AxisGroup; axis: 0 | 1; sign: 1 | -1 }
    | { kind: 'gear'; gear: Gear }
    | { kind: 'modifier' }
    | { kind: 'fire' }
    | { kind: 'quit' };

export const KEY_EFFECTS: Readonly<Record<TeleopKey, KeyEffect>> = {
    forward:     { kind: 'axis', group: 'chassis', axis: 0, sign: 1 },
    back:        { kind: 'axis', group: 'chassis', axis: 0, sign: -1 },
    left:        { kind: 'axis', group: 'chassis', axis: 1, sign: -1 },
    right:       { kind: 'axis', group: 'chassis', axis: 1, sign: 1 },
    gimbalUp:    { kind: 'axis', group: 'gimbal',  axis: 0, sign: 1 },
    gimbalDown:  { kind: 'axis', group: 'gimbal',  axis: 0, sign: -1 },
    gimbalLeft:  { kind: 'axis', group: 'gimbal',  axis: 1, sign: -1 },
    gimbalRight: { kind: 'axis', group: 'gimbal',  axis: 1, sign: 1 },
    modifier:    { kind: 'modifier' },
    fire:        { kind: 'fire' },
    gear1:       { kind: 'gear', gear: 1 },
    gear2:       { kind: 'gear', gear: 2 },
    gear3:       { kind: 'gear', gear: 3 },
    gear4:       { kind: 'gear', gear: 4 },
    gear5:       { kind: 'gear', gear: 5 },
    quit:        { kind: 'quit' },
};

/** Device key name → TeleopKey. Names follow Node's readline keypress names. */
export type KeyBindings = Readonly<Record<string, TeleopKey>>;

export const DEFAULT_KEY_BINDINGS: KeyBindings = {
    w: 'forward',
    s: 'back',
    a: 'left',
    d: 'right',
    up: 'gimbalUp',
    down: 'gimbalDown',
    left: 'gimbalLeft',
    right: 'gimbalRight',
    ctrl: 'modifier',
    space: 'fire',
    '1': 'gear1',
    '2': 'gear2',
    '3': 'gear3',
    '4': 'gear4',
    '5': 'gear5',
    c: 'quit',
};

export function resolveKey(name: string, bindings: KeyBindings = DEFAULT_KEY_BINDINGS): TeleopKey | undefined {
    return Object.prototype.hasOwnProperty.call(bindings, name) ? bindings[name] : undefined;
}
