/**
 * Schemas for `lsblk --json` output. Older util-linux releases print sizes
 * and flags as strings, so both forms are accepted.
 */

import { z } from 'zod';

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

const lsblkFlag = z
  .union([z.boolean(), z.string()])
  .nullish()
  .transform((value) => value === true || value === '1');

export const rawBlockDeviceSchema = z.object({
  name: z.string(),
  size: z
    .union([z.number(), z.string()])
    .nullish()
    .transform((value) => value ?? null),
  type: z.string(),
  tran: optionalText,
  rm: lsblkFlag,
  ro: lsblkFlag,
  vendor: optionalText,
  model: optionalText,
});

export const lsblkOutputSchema = z.object({
  blockdevices: z.array(z.unknown()),
});
