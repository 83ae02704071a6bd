import { err, ok, type Result } from "neverthrow";
import {
  boundaryError,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type {
  PluginFactory,
  SourcePluginPort,
} from "../../core/ports/inboundPorts";
import { logger } from "../../shared/logger/logger";

/**
 * Name -> factory table. Plugins are built on resolve, so a misconfigured source only
 * fails the runs that ask for it.
 */
export class PluginRegistry {
  private readonly factories = new Map<string, PluginFactory>();

  register(
    name: string,
    factory: PluginFactory,
  ): Result<void, AppBoundaryError> {
    const key = name.trim();
    if (!key) {
      return err(
        boundaryError("registry", "invalid_input", "registry", "Plugin name must not be empty."),
      );
    }

    if (this.factories.has(key)) {
      return err(
        boundaryError(
          "registry",
          "duplicate_name",
          key,
          `Plugin '${key}' is already registered.`,
        ),
      );
    }

    this.factories.set(key, factory);
    logger.debug({ plugin: key }, "Plugin registered");
    return ok(undefined);
  }

  /**
   * Instantiates the requested plugins in request order. Repeated names resolve once.
   */
  resolve(names: readonly string[]): Result<SourcePluginPort[], AppBoundaryError> {
    const requested = Array.from(new Set(names.map((name) => name.trim())));
    const unknown = requested.filter((name) => !this.factories.has(name));

    if (unknown.length > 0) {
      return err(
        boundaryError(
          "registry",
          "unknown_plugin",
          unknown.join(","),
          `Unknown plugin(s): ${unknown.join(", ")}. Available plugins: ${this.list().join(", ") || "none"}.`,
        ),
      );
    }

    const plugins: SourcePluginPort[] = [];
    for (const name of requested) {
      const factory = this.factories.get(name);
      if (!factory) {
        continue;
      }

      try {
        plugins.push(factory());
      } catch (error) {
        return err(
          boundaryError(
            "registry",
            "config_invalid",
            name,
            `Error initializing plugin '${name}': ${error instanceof Error ? error.message : String(error)}`,
            { cause: error },
          ),
        );
      }
    }

    return ok(plugins);
  }

  list(): string[] {
    return [...this.factories.keys()];
  }
}
