/**
 * Configuration Schema
 *
 * Shape and defaults of the JSON configuration file. Every field is optional
 * in the file; parsing fills in the defaults.
 */

import { z } from 'zod';
import { DirectionSchema, ScreenSizeSchema } from '../shared/schemas/index.js';
import { labelCharacterProblem } from '../hints/label-allocator.js';

// No "m": a terminal cannot tell Ctrl+m from Enter
export const DEFAULT_ALPHABET = 'asdfgqwertzxcvbyuiopn';
export const DEFAULT_SOCKET_PATH = '/tmp/keyhints.socket';

export const LabelActionBindingSchema = z.enum([
  'left-click',
  'right-click',
  'middle-click',
  'double-click',
  'drag',
  'hover',
]);

export const MouseConfigSchema = z.object({
  movePixels: z.number().int().positive().default(10).describe('Pixels per move step'),
  directionKeys: z
    .record(z.string().min(1), DirectionSchema)
    .default({ h: 'left', j: 'down', k: 'up', l: 'right' })
    .describe('Key -> direction; arrow keys are always bound'),
  maxRepeat: z.number().int().positive().default(999),
});

export const ModifierConfigSchema = z.object({
  none: LabelActionBindingSchema.default('left-click'),
  shift: LabelActionBindingSchema.default('right-click'),
  alt: LabelActionBindingSchema.default('drag'),
  ctrl: LabelActionBindingSchema.default('hover'),
});

export const DaemonConfigSchema = z.object({
  scaleFactor: z.number().positive().default(1),
  screen: ScreenSizeSchema.optional().describe('Display bounds for range checks'),
  writeStallMs: z.number().int().positive().default(5000),
  settleMs: z.number().int().nonnegative().default(50),
  buttonPauseMs: z.number().int().nonnegative().default(25),
  stepPauseMs: z.number().int().nonnegative().default(10),
  maxFrameBytes: z.number().int().min(16).default(65536),
});

export const KeyhintsConfigSchema = z
  .object({
    alphabet: z
      .string()
      .min(1)
      .default(DEFAULT_ALPHABET)
      .refine((value) => new Set(Array.from(value)).size === Array.from(value).length, {
        message: 'alphabet must not repeat characters',
      })
      .superRefine((value, ctx) => {
        for (const ch of Array.from(value)) {
          const problem = labelCharacterProblem(ch);
          if (problem) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `alphabet cannot contain ${problem}` });
            return;
          }
        }
      }),
    minLabelLength: z.number().int().positive().default(1),
    maxLabelLength: z.number().int().positive().default(4),
    socketPath: z.string().min(1).default(DEFAULT_SOCKET_PATH),
    mouse: MouseConfigSchema.default({}),
    modifiers: ModifierConfigSchema.default({}),
    daemon: DaemonConfigSchema.default({}),
  })
  .strict();

export type KeyhintsConfig = z.infer<typeof KeyhintsConfigSchema>;
export type KeyhintsConfigInput = z.input<typeof KeyhintsConfigSchema>;
