/**
 * PATH lookup for optional helper programs.
 */

import { constants } from 'fs';
import { access } from 'fs/promises';
import { delimiter, isAbsolute, join } from 'path';

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Absolute path of `program` when it is an executable somewhere in PATH. */
export async function findProgram(program: string, env: NodeJS.ProcessEnv = process.env): Promise<string | null> {
  if (program.includes('/')) {
    return isAbsolute(program) && (await isExecutable(program)) ? program : null;
  }
  for (const dir of (env.PATH ?? '').split(delimiter)) {
    if (dir === '') continue;
    const candidate = join(dir, program);
    if (await isExecutable(candidate)) {
      return candidate;
    }
  }
  return null;
}

export async function programInPath(program: string, env: NodeJS.ProcessEnv = process.env): Promise<boolean> {
  return (await findProgram(program, env)) !== null;
}
