import { z } from 'zod';
import { collectModifiers } from '../input/keymap.js';
import type { InputEvent } from '../input/events.js';

const coordinate = z.number().finite();

export const mouseMessageSchema = z.object({
  type: z.literal('mouse'),
  eventType: z.enum(['mousedown', 'mouseup', 'mousemove', 'dblclick']),
  x: coordinate,
  y: coordinate,
  isDoubleClick: z.boolean().optional(),
});

export const keyboardMessageSchema = z.object({
  type: z.literal('keyboard'),
  eventType: z.enum(['keydown', 'keyup']),
  key: z.string().min(1).max(32),
  code: z.string().max(32).optional(),
  shiftKey: z.boolean().optional(),
  ctrlKey: z.boolean().optional(),
  altKey: z.boolean().optional(),
  metaKey: z.boolean().optional(),
});

export const scrollMessageSchema = z.object({
  type: z.literal('scroll'),
  deltaX: z.number().finite().default(0),
  deltaY: z.number().finite().default(0),
});

export const navigationMessageSchema = z.object({
  type: z.literal('navigation'),
  url: z.string().max(2048),
});

export const resizeMessageSchema = z.object({
  type: z.literal('resize'),
  width: z.number(),
  height: z.number(),
});

export const controlMessageSchema = z.discriminatedUnion('type', [
  mouseMessageSchema,
  keyboardMessageSchema,
  scrollMessageSchema,
  navigationMessageSchema,
  resizeMessageSchema,
]);

export type ControlMessage = z.infer<typeof controlMessageSchema>;

export function toInputEvent(message: ControlMessage): InputEvent {
  switch (message.type) {
    case 'mouse': {
      const { x, y } = message;
      // isDoubleClick is ignored; eventType alone selects the pointer event.
      if (message.eventType === 'dblclick') return { kind: 'double-click', x, y };
      if (message.eventType === 'mousedown') return { kind: 'pointer-down', x, y };
      if (message.eventType === 'mouseup') return { kind: 'pointer-up', x, y };
      return { kind: 'pointer-move', x, y };
    }
    case 'keyboard':
      return {
        kind: message.eventType === 'keydown' ? 'key-down' : 'key-up',
        key: message.key,
        code: message.code,
        modifiers: collectModifiers(message),
      };
    case 'scroll':
      return { kind: 'scroll', deltaX: message.deltaX, deltaY: message.deltaY };
    case 'navigation':
      return { kind: 'navigate', url: message.url };
    case 'resize':
      return { kind: 'resize', width: message.width, height: message.height };
  }
}
