import type { Modifier } from '../browser/types.js';

/** DOM key names forwarded to the tab as-is. */
const SPECIAL_KEYS: ReadonlySet<string> = new Set([
  'Backspace',
  'Enter',
  'Tab',
  'Escape',
  'ArrowLeft',
  'ArrowRight',
  'ArrowUp',
  'ArrowDown',
  'Delete',
  'Insert',
  'Home',
  'End',
  'PageUp',
  'PageDown',
  'F1',
  'F2',
  'F3',
  'F4',
  'F6',
  'F7',
  'F8',
  'F9',
  'F10',
  'F11',
  'F12',
]);

const RELOAD_KEY = 'F5';

export type KeyAction =
  | { type: 'press'; key: string; modifiers: Modifier[] }
  | { type: 'type'; text: string }
  | { type: 'reload' }
  | { type: 'unhandled'; key: string };

export interface ModifierFlags {
  shiftKey?: boolean;
  ctrlKey?: boolean;
  altKey?: boolean;
  metaKey?: boolean;
}

export function collectModifiers(flags: ModifierFlags): Set<Modifier> {
  const modifiers = new Set<Modifier>();
  if (flags.shiftKey) modifiers.add('Shift');
  if (flags.ctrlKey) modifiers.add('Control');
  if (flags.altKey) modifiers.add('Alt');
  if (flags.metaKey) modifiers.add('Meta');
  return modifiers;
}

const MODIFIER_ORDER: readonly Modifier[] = ['Shift', 'Control', 'Alt', 'Meta'];

function ordered(modifiers: ReadonlySet<Modifier>): Modifier[] {
  return MODIFIER_ORDER.filter((modifier) => modifiers.has(modifier));
}

function isShortcut(modifiers: ReadonlySet<Modifier>): boolean {
  return modifiers.has('Control') || modifiers.has('Alt') || modifiers.has('Meta');
}

export function resolveKey(key: string, modifiers: ReadonlySet<Modifier>): KeyAction {
  if (key === RELOAD_KEY) return { type: 'reload' };
  if (SPECIAL_KEYS.has(key)) return { type: 'press', key, modifiers: ordered(modifiers) };
  // Array.from counts code points, so astral characters still count as one.
  if (Array.from(key).length === 1) {
    // Shift is already folded into the character the client reported.
    if (isShortcut(modifiers)) return { type: 'press', key, modifiers: ordered(modifiers) };
    return { type: 'type', text: key };
  }
  return { type: 'unhandled', key };
}
