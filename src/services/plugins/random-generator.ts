import type { DataItem } from '../../types/session';
import { createLogger } from '../../utils/logger';
import { MS_PER_DAY, MS_PER_MINUTE } from '../../utils/time';
import { createSeries } from '../series/series';
import type { InspectorPlugin, PluginAction, PluginFactory, PluginHost, SlotBindings } from './types';

const logger = createLogger('plugins');

export const RANDOM_GENERATOR = 'RandomGenerator';
export const DEFAULT_RANDOM_DAYS = 20;

export interface RandomGeneratorOptions {
  /** Uniform [0, 1) source */
  random?: () => number;
  now?: () => number;
}

/** Standard normal sample (Box-Muller) */
function gaussian(random: () => number): number {
  const u = 1 - random();
  const v = random();
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

/** Generates days of minute-frequency random data ending now */
export class RandomGenerator implements InspectorPlugin {
  readonly name = RANDOM_GENERATOR;
  readonly actions: readonly PluginAction[];
  readonly slotBindings: SlotBindings = {};
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(
    private readonly host: PluginHost,
    { random = Math.random, now = Date.now }: RandomGeneratorOptions = {}
  ) {
    this.random = random;
    this.now = now;
    this.actions = [{ name: 'Generate', run: () => this.generate() }];
  }

  generate(days: number = DEFAULT_RANDOM_DAYS, nSeries = 1): DataItem[] {
    if (!(days > 0)) {
      logger.info('Cancelled, no data generated');
      return [];
    }
    const added: DataItem[] = [];
    for (let n = 0; n < nSeries; n++) {
      const end = this.now();
      const start = end - days * MS_PER_DAY;
      const index: number[] = [];
      for (let t = start; t <= end; t += MS_PER_MINUTE) index.push(t);
      const values = index.map(() => gaussian(this.random) * 100 + 100);
      const result = this.host.newData(createSeries('time', index, values), `Random ${days} days`, {
        time_generated: new Date(end).toISOString(),
        length: values.length,
      });
      if (result.ok) added.push(result.value);
    }
    return added;
  }

  destroy(): void {}
}

export function randomGeneratorPlugin(options: RandomGeneratorOptions = {}): PluginFactory {
  return {
    name: RANDOM_GENERATOR,
    create: (host) => new RandomGenerator(host, options),
  };
}
