import { accessSync, constants } from 'fs';
import { delimiter, join } from 'path';

export function which(cmd: string, pathEnv = process.env.PATH): string | null {
  const paths = pathEnv?.split(delimiter).filter(Boolean) ?? [];
  for (const p of paths) {
    const full = join(p, cmd);
    try {
      accessSync(full, constants.X_OK);
      return full;
    } catch {
      // not here (or not executable); keep looking
    }
  }
  return null;
}
