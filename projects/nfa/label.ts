export type State = number;

/**
 * What an edge of the automaton consumes: either a single
 * literal character, or nothing at all (an epsilon move).
 */
export type Label =
  | { readonly kind: 'char'; readonly char: string }
  | { readonly kind: 'epsilon' };

export const EPSILON: Label = Object.freeze({ kind: 'epsilon' });

export function label(char: string): Label {
  if (char.length != 1) {
    throw new Error(
      `Labels can only be made from strings of length 1. Given: ${char}`
    );
  }
  return { kind: 'char', char };
}

export function isEpsilon(l: Label): boolean {
  return l.kind == 'epsilon';
}

/**
 * Hash a label so that structurally equal labels collide
 * and a literal 'ϵ' never collides with the epsilon marker.
 */
export function labelKey(l: Label): string {
  return l.kind == 'epsilon' ? 'epsilon' : `char:${l.char}`;
}

export function labelToString(l: Label): string {
  return l.kind == 'epsilon' ? 'ϵ' : l.char;
}
