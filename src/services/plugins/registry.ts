import { createLogger } from '../../utils/logger';
import type { PluginFactory } from './types';

const logger = createLogger('plugins');

/**
 * Build the immutable name → factory registry. Factories without a name, or
 * whose name is already taken, are logged and left out.
 */
export function registerPlugins(factories: readonly PluginFactory[]): ReadonlyMap<string, PluginFactory> {
  const registry = new Map<string, PluginFactory>();
  for (const factory of factories) {
    if (!factory.name) {
      logger.error('Plugin is missing a name, skipping');
      continue;
    }
    if (registry.has(factory.name)) {
      logger.error(`Could not register plugin "${factory.name}" because of name conflict`);
      continue;
    }
    registry.set(factory.name, factory);
    logger.debug(`Registered plugin: ${factory.name}`);
  }
  return registry;
}
