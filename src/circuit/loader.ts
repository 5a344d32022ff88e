import { readFile } from 'node:fs/promises';
import { Program, programFileSchema } from './program';
import { CircuitError } from '../errors';

export interface ProgramFile {
  program: Program;
  target?: { name: string; shots?: number };
}

export function parseProgram(json: unknown): ProgramFile {
  const parsed = programFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new CircuitError(`Invalid program: ${issues}`);
  }
  const { target, name, version, modes, operations } = parsed.data;
  return { program: { name, version, modes, operations }, target };
}

/**
 * Load a JSON program description from disk.
 */
export async function loadProgram(path: string): Promise<ProgramFile> {
  const text = await readFile(path, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new CircuitError(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseProgram(json);
}
