import type { CircuitSerializer, Operation, Program } from './program';
import type { TargetSpec } from '../types';
import { CircuitError } from '../errors';

/**
 * Serializes programs into Blackbird script text:
 *
 *   name teleport
 *   version 1.0
 *   target chip2 (shots=123)
 *
 *   Dgate(0.5) | [0]
 *   MeasureFock() | [0, 1]
 */
export class BlackbirdSerializer implements CircuitSerializer {
  serialize(program: Program, target: TargetSpec): string {
    if (!target.name) throw new CircuitError('target name required');
    if (/\s/.test(program.name)) throw new CircuitError(`program name "${program.name}" must not contain whitespace`);

    const lines = [`name ${program.name}`, `version ${program.version}`, formatTarget(target), ''];
    for (const op of program.operations) lines.push(formatOperation(op));
    return lines.join('\n') + '\n';
  }
}

function formatTarget(target: TargetSpec): string {
  const options = Object.entries(target.options).map(([key, value]) => `${key}=${value}`);
  return options.length > 0 ? `target ${target.name} (${options.join(', ')})` : `target ${target.name}`;
}

function formatOperation(op: Operation): string {
  return `${op.name}(${op.params.map((p) => String(p)).join(', ')}) | [${op.modes.join(', ')}]`;
}
