import { logger } from "../core/logger";
import { CommandNotFoundError } from "../core/errors";
import type { CommandSpec, PluginDescriptor } from "./types";

export interface RegisteredCommand {
  name: string;
  plugin: string;
  spec: CommandSpec;
}

export class PluginRegistry {
  private readonly commands = new Map<string, RegisteredCommand>();
  private frozen = false;

  register(plugin: PluginDescriptor): void {
    if (this.frozen) {
      throw new Error(`Plugin registry is frozen; cannot register "${plugin.name}"`);
    }

    for (const [name, spec] of Object.entries(plugin.commands)) {
      const key = name.toLowerCase();
      const existing = this.commands.get(key);
      if (existing) {
        logger.warn(
          { command: key, previous: existing.plugin, next: plugin.name },
          "Command registered twice, keeping the later plugin"
        );
      }
      this.commands.set(key, { name: key, plugin: plugin.name, spec });
    }
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  resolve(name: string): RegisteredCommand {
    const command = this.commands.get(name.toLowerCase());
    if (!command) {
      throw new CommandNotFoundError(name);
    }
    return command;
  }

  list(): RegisteredCommand[] {
    return [...this.commands.values()].sort((a, b) => a.name.localeCompare(b.name));
  }
}
