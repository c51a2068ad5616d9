// Style presets served from a JSON file

import { promises as fs } from 'fs';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { formatZodError } from '../../core/utils/validation.js';

const ProfileSchema = z.object({
  id: z.string(),
  name: z.string(),
  preview: z.string(),
  tags: z.array(z.string()).default([]),
  model_id: z.string(),
  lora: z.string(),
  seed: z.number().int(),
  prompt: z.string(),
  negative_prompt: z.string(),
});

const ProfilesSchema = z.array(ProfileSchema);

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export default function (profilesFile: string) {
  return async function (req: Request, res: Response, next: NextFunction) {
    let raw: string;
    try {
      raw = await fs.readFile(profilesFile, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        res.status(404).json({ error: 'Not Found', message: 'Profiles file not found.' });
        return;
      }
      next(error);
      return;
    }

    try {
      const result = ProfilesSchema.safeParse(JSON.parse(raw));
      if (!result.success) {
        throw new Error(`Invalid profiles file: ${formatZodError(result.error)}`);
      }
      res.json(result.data);
    } catch (error) {
      next(error);
    }
  };
}
