import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import * as path from 'node:path';

export type LocateExecutableFn = (name: string) => Promise<string | null>;

export interface LocateOptions {
  readonly env?: NodeJS.ProcessEnv;
  readonly platform?: NodeJS.Platform;
}

const DEFAULT_PATHEXT = '.COM;.EXE;.BAT;.CMD';

/** First executable file named `name` on PATH, or null. */
export async function locateExecutable(
  name: string,
  options: LocateOptions = {},
): Promise<string | null> {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;

  const dirs = (env.PATH ?? env.Path ?? '').split(path.delimiter).filter((dir) => dir.length > 0);
  const extensions =
    platform === 'win32' ? ['', ...(env.PATHEXT ?? DEFAULT_PATHEXT).split(';')] : [''];

  for (const dir of dirs) {
    for (const extension of extensions) {
      const candidate = path.join(dir, name + extension);
      if (await isExecutableFile(candidate, platform)) {
        return candidate;
      }
    }
  }
  return null;
}

async function isExecutableFile(filePath: string, platform: NodeJS.Platform): Promise<boolean> {
  const isFile = await stat(filePath).then(
    (stats) => stats.isFile(),
    () => false,
  );
  if (!isFile) return false;
  if (platform === 'win32') return true;

  return access(filePath, constants.X_OK).then(
    () => true,
    () => false,
  );
}
