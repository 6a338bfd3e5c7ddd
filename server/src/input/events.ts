import type { Modifier } from '../browser/types.js';

export type InputEvent =
  | { kind: 'pointer-down'; x: number; y: number }
  | { kind: 'pointer-up'; x: number; y: number }
  | { kind: 'pointer-move'; x: number; y: number }
  | { kind: 'double-click'; x: number; y: number }
  | { kind: 'key-down'; key: string; code?: string; modifiers: ReadonlySet<Modifier> }
  | { kind: 'key-up'; key: string; code?: string; modifiers: ReadonlySet<Modifier> }
  | { kind: 'scroll'; deltaX: number; deltaY: number }
  | { kind: 'navigate'; url: string }
  | { kind: 'resize'; width: number; height: number };

export type InputOutcome = 'dispatched' | 'ignored' | 'unhandled' | 'failed';
