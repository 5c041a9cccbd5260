import { z } from 'zod';

import packageJsonRaw from '../package.json' with { type: 'json' };

const PkgInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string().optional(),
  bin: z.record(z.string(), z.string()).optional(),
});

const parsed = PkgInfoSchema.parse(packageJsonRaw);

export const pkgInfo = {
  ...parsed,
  /** The executable name from `bin`, shown in CLI usage. */
  commandName: Object.keys(parsed.bin ?? {})[0] ?? parsed.name,
};
