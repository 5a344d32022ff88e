import { z } from 'zod';
import type { TargetSpec } from '../types';

export interface Operation {
  name: string;
  params: number[];
  modes: number[];
}

/**
 * A circuit program: a named, versioned sequence of gate and measurement
 * operations acting on `modes` subsystems.
 */
export interface Program {
  name: string;
  version: string;
  modes: number;
  operations: Operation[];
}

/**
 * Turns a program into the text transmitted to the platform.
 */
export interface CircuitSerializer {
  serialize(program: Program, target: TargetSpec): string;
}

export const operationSchema = z.object({
  name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'operation names must be identifiers'),
  params: z.array(z.number().finite()).default([]),
  modes: z.array(z.number().int().nonnegative()).min(1)
});

const programShape = z.object({
  name: z.string().min(1).default('program'),
  version: z.string().min(1).default('1.0'),
  modes: z.number().int().positive(),
  operations: z.array(operationSchema)
});

function checkModes(program: z.infer<typeof programShape>, ctx: z.RefinementCtx) {
  program.operations.forEach((op, index) => {
    op.modes.forEach((mode, j) => {
      if (mode >= program.modes) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `mode ${mode} is out of range for a ${program.modes}-mode program`,
          path: ['operations', index, 'modes', j]
        });
      }
    });
  });
}

export const programSchema = programShape.superRefine(checkModes);

/**
 * A program file may also name the target it should run on.
 */
export const programFileSchema = programShape
  .extend({
    target: z
      .object({
        name: z.string().min(1),
        shots: z.number().int().positive().optional()
      })
      .optional()
  })
  .superRefine(checkModes);
