// Generation parameters - typed and validated once, at admission time

import { randomInt } from 'crypto';
import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { GenerationParameters } from './types/job.js';
import { blankAsUndefined, formatZodError } from './utils/validation.js';

export const MAX_SEED = 2 ** 32 - 1;
export const MAX_SEQUENCE_LENGTH = 512;

export interface GenerationDefaults {
  width: number;
  height: number;
  num_inference_steps: number;
  guidance_scale: number;
  true_cfg_scale: number;
}

const optionalText = blankAsUndefined(z.string().trim().max(2000).optional());

export function createGenerationParametersSchema(defaults: GenerationDefaults) {
  return z.object({
    prompt: z.string().max(2000).default(''),
    width: blankAsUndefined(z.coerce.number().int().min(64).max(2048).default(defaults.width)),
    height: blankAsUndefined(z.coerce.number().int().min(64).max(2048).default(defaults.height)),
    num_inference_steps: blankAsUndefined(
      z.coerce.number().int().min(1).max(100).default(defaults.num_inference_steps)
    ),
    guidance_scale: blankAsUndefined(
      z.coerce.number().min(0).max(20).default(defaults.guidance_scale)
    ),
    true_cfg_scale: blankAsUndefined(
      z.coerce.number().min(0).max(20).default(defaults.true_cfg_scale)
    ),
    seed: blankAsUndefined(z.coerce.number().int().min(0).lt(MAX_SEED).optional()),
    prompt_2: optionalText,
    negative_prompt: optionalText,
    negative_prompt_2: optionalText,
  });
}

/**
 * Parses raw request fields into generation parameters. Missing numeric
 * fields take the configured defaults; a missing seed is drawn at random.
 */
export function parseGenerationParameters(
  input: unknown,
  defaults: GenerationDefaults,
  randomSeed: () => number = () => randomInt(0, MAX_SEED)
): GenerationParameters {
  const result = createGenerationParametersSchema(defaults).safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid generation parameters: ${formatZodError(result.error)}`);
  }

  const { seed, prompt_2, negative_prompt, negative_prompt_2, ...fields } = result.data;
  const parameters: GenerationParameters = {
    ...fields,
    seed: seed ?? randomSeed(),
    max_sequence_length: MAX_SEQUENCE_LENGTH,
    num_images_per_prompt: 1,
  };

  if (prompt_2) parameters.prompt_2 = prompt_2;
  if (negative_prompt) parameters.negative_prompt = negative_prompt;
  if (negative_prompt_2) parameters.negative_prompt_2 = negative_prompt_2;

  return parameters;
}
