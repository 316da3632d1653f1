import { ProxyServer, type ProxyServerOptions } from "./proxy/server";
import type { ProxyLog, ProxySettings, ProxyState, ProxyStats } from "./proxy/types";
import {
  applySettingsPatch,
  defaultSettings,
  describeSettings,
  toSettingsView,
  type SettingsPatch,
  type SettingsStore,
  type SettingsView,
} from "./settings";

export interface ProxyControllerOptions {
  store: SettingsStore;
  log: ProxyLog;
  /** Applied on top of whatever the store loads; not saved. */
  overrides?: SettingsPatch;
  server?: Omit<ProxyServerOptions, "log">;
}

export interface ProxyStatus {
  state: ProxyState;
  running: boolean;
  /** Bound port while running. */
  port: number | null;
  settings: SettingsView;
  summary: string;
  stats: ProxyStats | null;
}

/**
 * Meeting place between the control API and the proxy. Owns the current
 * settings snapshot and at most one server; new settings take effect by
 * stopping the server and starting a fresh one.
 */
export class ProxyController {
  private settings: ProxySettings = defaultSettings();
  private server: ProxyServer | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly options: ProxyControllerOptions) {}

  /** Loads stored settings and applies the overrides. */
  async init(): Promise<ProxySettings> {
    const loaded = await this.options.store.load();
    const base = this.options.store.settings;
    this.settings = this.options.overrides ? applySettingsPatch(base, this.options.overrides) : base;
    this.options.log.debug(`${loaded ? "Loaded" : "Default"} settings: ${describeSettings(this.settings)}`);
    return this.settings;
  }

  getSettings(): ProxySettings {
    return this.settings;
  }

  isRunning(): boolean {
    return this.server?.isRunning() ?? false;
  }

  status(): ProxyStatus {
    const server = this.server;
    return {
      state: server?.state ?? "stopped",
      running: server?.isRunning() ?? false,
      port: server?.port ?? null,
      settings: toSettingsView(this.settings),
      summary: describeSettings(this.settings),
      stats: server ? server.getStats() : null,
    };
  }

  /** Starts the proxy with the current settings; a no-op while running. */
  start(): Promise<ProxyStatus> {
    return this.exclusive(async () => {
      await this.startServer();
      return this.status();
    });
  }

  stop(): Promise<ProxyStatus> {
    return this.exclusive(async () => {
      await this.stopServer();
      return this.status();
    });
  }

  restart(): Promise<ProxyStatus> {
    return this.exclusive(async () => {
      await this.stopServer();
      await this.startServer();
      return this.status();
    });
  }

  /**
   * Validates and saves new settings. A running proxy is restarted with
   * them; a stopped one stays stopped.
   */
  updateSettings(patch: SettingsPatch): Promise<{ status: ProxyStatus; saved: boolean }> {
    return this.exclusive(async () => {
      const next = applySettingsPatch(this.settings, patch);
      return this.replaceSettings(next);
    });
  }

  resetSettings(): Promise<{ status: ProxyStatus; saved: boolean }> {
    return this.exclusive(() => this.replaceSettings(defaultSettings()));
  }

  private async replaceSettings(next: ProxySettings) {
    const saved = await this.options.store.save(next);
    const wasRunning = this.isRunning();
    this.settings = next;
    this.options.log.debug(`Settings changed: ${describeSettings(next)}`);

    if (wasRunning) {
      await this.stopServer();
      if (next.destination) {
        await this.startServer();
      }
    }
    return { status: this.status(), saved };
  }

  private async startServer() {
    if (this.server?.isRunning()) return;

    const server = new ProxyServer(this.settings, { ...this.options.server, log: this.options.log });
    await server.start();
    this.server = server;
  }

  private async stopServer() {
    const server = this.server;
    if (!server) return;
    await server.stop();
  }

  /** Runs control operations one at a time. */
  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.queue.then(operation);
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
