import fs from "fs";
import path from "path";
import { z } from "zod";
import {
  DEFAULT_BYTES_PER_SECOND,
  DEFAULT_DESTINATION_PORT,
  DEFAULT_LISTEN_PORT,
  SETTINGS_KEY_PREFIX,
} from "../shared/const";
import type { Destination, ProxyLog, ProxySettings } from "./proxy/types";

export const SETTINGS_KEYS = {
  bytesPerSecond: `${SETTINGS_KEY_PREFIX}.bytesPerSecond`,
  listenPort: `${SETTINGS_KEY_PREFIX}.listenPort`,
  destinationUrl: `${SETTINGS_KEY_PREFIX}.destinationURL`,
} as const;

export class SettingsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SettingsError";
  }
}

const destinationUrlSchema = z
  .string()
  .trim()
  .url()
  .refine((value) => URL.canParse(value) && new URL(value).hostname !== "", {
    message: "Destination must include a host",
  });

export const settingsPatchSchema = z.object({
  listenPort: z.number().int().min(1).max(65535).optional(),
  destinationUrl: destinationUrlSchema.nullable().optional(),
  bytesPerSecond: z.number().int().min(0).optional(),
});

export type SettingsPatch = z.infer<typeof settingsPatchSchema>;

/** JSON-friendly form of the settings, as the control API reports them. */
export interface SettingsView {
  listenPort: number;
  destinationUrl: string | null;
  bytesPerSecond: number;
}

export function defaultSettings(): ProxySettings {
  return {
    listenPort: DEFAULT_LISTEN_PORT,
    destination: null,
    bytesPerSecond: DEFAULT_BYTES_PER_SECOND,
  };
}

/** Host and port to dial for a destination URL; port 80 when the URL has none. */
export function parseDestination(value: string): Destination {
  const parsed = destinationUrlSchema.safeParse(value);
  if (!parsed.success) {
    throw new SettingsError(`Invalid destination URL "${value}": ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  const url = new URL(parsed.data);
  // IPv6 hosts come back bracketed
  const host = url.hostname.replace(/^\[(.*)\]$/, "$1");
  const port = url.port ? parseInt(url.port, 10) : DEFAULT_DESTINATION_PORT;
  return { url: parsed.data, host, port };
}

export function applySettingsPatch(base: ProxySettings, patch: SettingsPatch): ProxySettings {
  const parsed = settingsPatchSchema.safeParse(patch);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SettingsError(`Invalid ${issue?.path.join(".") || "settings"}: ${issue?.message ?? "invalid"}`, {
      cause: parsed.error,
    });
  }
  const { listenPort, destinationUrl, bytesPerSecond } = parsed.data;
  return {
    listenPort: listenPort ?? base.listenPort,
    destination:
      destinationUrl === undefined ? base.destination
      : destinationUrl === null ? null
      : parseDestination(destinationUrl),
    bytesPerSecond: bytesPerSecond ?? base.bytesPerSecond,
  };
}

export function toSettingsView(settings: ProxySettings): SettingsView {
  return {
    listenPort: settings.listenPort,
    destinationUrl: settings.destination?.url ?? null,
    bytesPerSecond: settings.bytesPerSecond,
  };
}

export function describeSettings(settings: ProxySettings): string {
  return `Port=${settings.listenPort} Destination=${settings.destination?.url ?? "none"} Bytes per second=${settings.bytesPerSecond}`;
}

// ---- properties files ----

function unescapeProperty(value: string): string {
  return value.replace(/\\(.)/g, (_, ch: string) => {
    switch (ch) {
      case "t":
        return "\t";
      case "n":
        return "\n";
      case "r":
        return "\r";
      default:
        return ch;
    }
  });
}

/**
 * Reads `key=value` (or `key: value`) lines. Blank lines and lines starting
 * with `#` or `!` are skipped; a later key wins over an earlier one.
 */
export function parseProperties(text: string): Map<string, string> {
  const props = new Map<string, string>();
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trimStart();
    if (line === "" || line.startsWith("#") || line.startsWith("!")) continue;

    const match = /^((?:\\.|[^=:\s\\])+)\s*[=:\s]\s*(.*)$/.exec(line);
    if (match) {
      props.set(unescapeProperty(match[1]), unescapeProperty(match[2].trimEnd()));
    } else {
      props.set(unescapeProperty(line.trimEnd()), "");
    }
  }
  return props;
}

function parseIntProperty(key: string, value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new SettingsError(`${key} must be a whole number, got "${value}"`);
  }
  return parseInt(value, 10);
}

/** Settings from properties; keys that are missing keep the value from `base`. */
export function settingsFromProperties(props: Map<string, string>, base: ProxySettings = defaultSettings()): ProxySettings {
  const patch: SettingsPatch = {};

  const bytes = props.get(SETTINGS_KEYS.bytesPerSecond);
  if (bytes !== undefined) patch.bytesPerSecond = parseIntProperty(SETTINGS_KEYS.bytesPerSecond, bytes);

  const port = props.get(SETTINGS_KEYS.listenPort);
  if (port !== undefined) patch.listenPort = parseIntProperty(SETTINGS_KEYS.listenPort, port);

  const destination = props.get(SETTINGS_KEYS.destinationUrl);
  if (destination !== undefined && destination.trim() !== "") patch.destinationUrl = destination;

  return applySettingsPatch(base, patch);
}

export function settingsToProperties(settings: ProxySettings): string {
  const lines: string[] = [];
  if (settings.destination) {
    lines.push(`${SETTINGS_KEYS.destinationUrl}=${settings.destination.url}`);
  }
  lines.push(`${SETTINGS_KEYS.listenPort}=${settings.listenPort}`);
  lines.push(`${SETTINGS_KEYS.bytesPerSecond}=${settings.bytesPerSecond}`);
  return lines.join("\n") + "\n";
}

// ---- stores ----

/** Where settings live between runs. Neither operation throws. */
export interface SettingsStore {
  /** The last loaded or saved snapshot; defaults until then. */
  readonly settings: ProxySettings;
  load(): Promise<boolean>;
  save(settings: ProxySettings): Promise<boolean>;
}

export class FileSettingsStore implements SettingsStore {
  private current: ProxySettings = defaultSettings();

  constructor(
    readonly filePath: string,
    private readonly log: ProxyLog,
  ) {}

  get settings(): ProxySettings {
    return this.current;
  }

  async load(): Promise<boolean> {
    this.log.debug(`Loading settings from ${this.filePath}`);
    let text: string;
    try {
      text = await fs.promises.readFile(this.filePath, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.log.debug("No saved settings, using defaults");
      } else {
        this.log.error("Failed to read saved settings", err);
      }
      return false;
    }

    try {
      this.current = settingsFromProperties(parseProperties(text));
      return true;
    } catch (err) {
      this.log.error(`Ignoring invalid settings in ${this.filePath}`, err);
      return false;
    }
  }

  async save(settings: ProxySettings): Promise<boolean> {
    this.log.debug(`Saving settings to ${this.filePath}`);
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(this.filePath, settingsToProperties(settings), "utf8");
      this.current = settings;
      return true;
    } catch (err) {
      this.log.error("Failed to save settings", err);
      return false;
    }
  }
}

/** Keeps settings for the life of the process only. */
export class MemorySettingsStore implements SettingsStore {
  private current: ProxySettings;
  private saveCount = 0;

  constructor(initial: ProxySettings = defaultSettings()) {
    this.current = initial;
  }

  get settings(): ProxySettings {
    return this.current;
  }

  /** Number of successful saves. */
  get saves(): number {
    return this.saveCount;
  }

  async load(): Promise<boolean> {
    return true;
  }

  async save(settings: ProxySettings): Promise<boolean> {
    this.current = settings;
    this.saveCount++;
    return true;
  }
}
