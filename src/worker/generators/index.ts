// Generator factory

import type { GeneratorConfig } from '../../core/config.js';
import type { ImageGenerator } from '../../core/types/generator.js';
import { RestGenerator } from './rest-generator.js';
import { SimulationGenerator } from './simulation-generator.js';

export function createGenerator(config: GeneratorConfig): ImageGenerator {
  switch (config.type) {
    case 'simulation':
      return new SimulationGenerator({
        processingMs: config.processingMs,
        failureRate: config.failureRate,
      });
    case 'rest':
      return new RestGenerator({ url: config.url, timeoutMs: config.timeoutMs });
  }
}

export { RestGenerator } from './rest-generator.js';
export { SimulationGenerator } from './simulation-generator.js';
