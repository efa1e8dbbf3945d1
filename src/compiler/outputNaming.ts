import { basename } from 'path';

import type { StubTarget } from '../config/configTypes.js';

export function getStaticLibName(baseName: string): string {
  return `lib${baseName}.a`;
}

/** `acc_detector_presence_a121_stubs.c` -> `acc_detector_presence_a121`. */
export function libraryBaseName(target: StubTarget): string {
  if (target.library) return target.library;
  return basename(target.output).replace(/\.[^.]*$/, '').replace(/_stubs$/, '');
}
