import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../../src/core/errors.js';
import {
  MAX_SEED,
  parseGenerationParameters,
} from '../../../src/core/generation-parameters.js';

const defaults = {
  width: 1024,
  height: 1024,
  num_inference_steps: 28,
  guidance_scale: 2.5,
  true_cfg_scale: 1.5,
};

describe('parseGenerationParameters', () => {
  it('fills defaults and draws a seed when fields are missing', () => {
    const parameters = parseGenerationParameters({}, defaults, () => 77);

    expect(parameters).toEqual({
      prompt: '',
      width: 1024,
      height: 1024,
      num_inference_steps: 28,
      guidance_scale: 2.5,
      true_cfg_scale: 1.5,
      seed: 77,
      max_sequence_length: 512,
      num_images_per_prompt: 1,
    });
  });

  it('coerces form strings and keeps provided optional prompts', () => {
    const parameters = parseGenerationParameters(
      {
        prompt: 'a red fox',
        width: '512',
        height: '768',
        num_inference_steps: '10',
        guidance_scale: '3.5',
        seed: '99',
        negative_prompt: ' blurry ',
        prompt_2: '',
      },
      defaults
    );

    expect(parameters.width).toBe(512);
    expect(parameters.height).toBe(768);
    expect(parameters.num_inference_steps).toBe(10);
    expect(parameters.guidance_scale).toBe(3.5);
    expect(parameters.seed).toBe(99);
    expect(parameters.negative_prompt).toBe('blurry');
    expect(parameters).not.toHaveProperty('prompt_2');
  });

  it('rejects out-of-range values with the field name', () => {
    expect(() => parseGenerationParameters({ width: '4096' }, defaults)).toThrow(ValidationError);
    expect(() => parseGenerationParameters({ width: '4096' }, defaults)).toThrow(
      'Invalid generation parameters: width Number must be less than or equal to 2048'
    );
  });

  it('rejects non-numeric and fractional values', () => {
    expect(() => parseGenerationParameters({ num_inference_steps: 'many' }, defaults)).toThrow(
      /^Invalid generation parameters: num_inference_steps /
    );
    expect(() => parseGenerationParameters({ height: '100.5' }, defaults)).toThrow(
      'Invalid generation parameters: height Expected integer, received float'
    );
  });

  it('keeps the seed below 2^32 - 1', () => {
    expect(() => parseGenerationParameters({ seed: String(MAX_SEED) }, defaults)).toThrow(
      /^Invalid generation parameters: seed /
    );
    expect(parseGenerationParameters({ seed: String(MAX_SEED - 1) }, defaults).seed).toBe(
      MAX_SEED - 1
    );
  });
});
