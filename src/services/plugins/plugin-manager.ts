import type { SessionStore } from '../../stores/session-store';
import { SESSION_EVENT_NAMES } from '../../stores/session-store';
import type { SessionEventMap, SessionEventName } from '../../types/session';
import type { EventBus, Unsubscribe } from '../../utils/event-bus';
import { createLogger } from '../../utils/logger';
import type { InspectorPlugin, PluginFactory, PluginHost, SlotBindings } from './types';

const logger = createLogger('plugins');

export function createPluginHost(session: SessionStore): PluginHost {
  return {
    newData: (series, name, metadata) => session.getState().addItem(series, name, metadata),
    newMarkings: (records, metadata) => session.getState().newMarkingsFromDescription(records, metadata),
    applyOnVisible: (callback) => session.getState().applyOnVisible(callback),
    acknowledgeDeletes: (entries) => session.getState().clearDeletedMarkings(entries),
  };
}

function bindSlot<K extends SessionEventName>(
  events: EventBus<SessionEventMap>,
  bindings: SlotBindings,
  name: K
): Unsubscribe | null {
  const handler = bindings[name];
  return handler ? events.on(name, handler) : null;
}

export function bindSlots(events: EventBus<SessionEventMap>, bindings: SlotBindings): Unsubscribe[] {
  const unbind: Unsubscribe[] = [];
  for (const name of SESSION_EVENT_NAMES) {
    const off = bindSlot(events, bindings, name);
    if (off) unbind.push(off);
  }
  return unbind;
}

interface EnabledPlugin {
  plugin: InspectorPlugin;
  unbind: Unsubscribe[];
}

/** Enables and disables registered plugins against one session */
export class PluginManager {
  private readonly enabled = new Map<string, EnabledPlugin>();
  private readonly host: PluginHost;

  constructor(
    private readonly session: SessionStore,
    private readonly registry: ReadonlyMap<string, PluginFactory>
  ) {
    this.host = createPluginHost(session);
  }

  get available(): string[] {
    return [...this.registry.keys()];
  }

  isEnabled(name: string): boolean {
    return this.enabled.has(name);
  }

  get(name: string): InspectorPlugin | undefined {
    return this.enabled.get(name)?.plugin;
  }

  /** Flip (or force) a plugin's state; returns whether it is enabled afterwards */
  toggle(name: string, enable: boolean = !this.isEnabled(name)): boolean {
    if (enable === this.isEnabled(name)) return enable;
    if (enable) {
      const factory = this.registry.get(name);
      if (!factory) {
        logger.error(`No plugin named "${name}"`);
        return false;
      }
      const plugin = factory.create(this.host);
      this.enabled.set(name, { plugin, unbind: bindSlots(this.session.events, plugin.slotBindings) });
      logger.info(`Enabled plugin: ${name}`);
      return true;
    }
    const entry = this.enabled.get(name);
    if (entry) {
      for (const off of entry.unbind) off();
      entry.plugin.destroy();
      this.enabled.delete(name);
      logger.info(`Disabled plugin: ${name}`);
    }
    return false;
  }

  runAction(pluginName: string, actionName: string): boolean {
    const action = this.get(pluginName)?.actions?.find((a) => a.name === actionName);
    if (!action) {
      logger.warn(`No action "${actionName}" on enabled plugin "${pluginName}"`);
      return false;
    }
    action.run();
    return true;
  }

  disableAll(): void {
    for (const name of [...this.enabled.keys()]) this.toggle(name, false);
  }
}
