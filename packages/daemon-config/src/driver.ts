/**
 * Filesystem drivers of the daemon, each with its own configuration shape
 */

export const FsDrivers = {
  FUSEDEV: 'fusedev',
  FSCACHE: 'fscache',
} as const;

export type FsDriver = typeof FsDrivers[keyof typeof FsDrivers];

const FS_DRIVERS: readonly string[] = Object.values(FsDrivers);

export function parseFsDriver(value: string): FsDriver | undefined {
  return isFsDriver(value) ? value : undefined;
}

function isFsDriver(value: string): value is FsDriver {
  return FS_DRIVERS.includes(value);
}
