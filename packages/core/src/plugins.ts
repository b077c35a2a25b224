/**
 * @tokenpilot/core — Plugin Manager
 *
 * Registry name → plugin. Lifecycle: register → enable (initialize) → execute → disable (cleanup).
 * A failing plugin is caught and reported; it never takes the host agent down.
 */

import { PluginError, errorMessage } from './errors.js';
import { createLogger } from './logger.js';

export type PluginContext = Record<string, unknown>;

export interface AgentPlugin {
    name: string;
    version: string;
    initialize: (config: Record<string, unknown>) => Promise<void> | void;
    execute: (context: PluginContext) => Promise<unknown> | unknown;
    cleanup: () => Promise<void> | void;
}

export type PluginOutcome =
    | { ok: true; plugin: string; value: unknown }
    | { ok: false; plugin: string; error: string };

const log = createLogger('Plugins');

export class PluginManager {
    private plugins: Map<string, AgentPlugin> = new Map();
    private enabled: string[] = [];

    register(plugin: AgentPlugin): void {
        if (this.plugins.has(plugin.name)) {
            throw new PluginError(plugin.name, `Plugin "${plugin.name}" already registered`);
        }
        this.plugins.set(plugin.name, plugin);
        log.info(`Plugin registered: ${plugin.name} v${plugin.version}`);
    }

    /** Initialize and enable. false if initialize() threw. */
    async enable(name: string, config: Record<string, unknown> = {}): Promise<boolean> {
        const plugin = this.require(name);
        if (this.enabled.includes(name)) return true;

        try {
            await plugin.initialize(config);
        } catch (err) {
            log.error(`Plugin "${name}" failed to initialize`, { error: errorMessage(err) });
            return false;
        }
        this.enabled.push(name);
        log.info(`Plugin enabled: ${name}`);
        return true;
    }

    async execute(name: string, context: PluginContext = {}): Promise<PluginOutcome> {
        const plugin = this.require(name);
        if (!this.enabled.includes(name)) {
            throw new PluginError(name, `Plugin "${name}" is not enabled`);
        }

        try {
            const value = await plugin.execute(context);
            return { ok: true, plugin: name, value };
        } catch (err) {
            const error = errorMessage(err);
            log.error(`Plugin "${name}" failed`, { error });
            return { ok: false, plugin: name, error };
        }
    }

    async disable(name: string): Promise<void> {
        const index = this.enabled.indexOf(name);
        if (index === -1) return;

        this.enabled.splice(index, 1);
        try {
            await this.require(name).cleanup();
        } catch (err) {
            log.error(`Plugin "${name}" cleanup failed`, { error: errorMessage(err) });
        }
        log.info(`Plugin disabled: ${name}`);
    }

    /** Disable everything, most recently enabled first */
    async disableAll(): Promise<void> {
        for (const name of [...this.enabled].reverse()) {
            await this.disable(name);
        }
    }

    isEnabled(name: string): boolean {
        return this.enabled.includes(name);
    }

    getPluginNames(): string[] {
        return [...this.plugins.keys()];
    }

    getEnabledPlugins(): string[] {
        return [...this.enabled];
    }

    private require(name: string): AgentPlugin {
        const plugin = this.plugins.get(name);
        if (!plugin) throw new PluginError(name, `Plugin not found: ${name}`);
        return plugin;
    }
}
