import path from "path";

function optionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export const ENV = {
  // Control API
  controlPort: parseInt(process.env.PORT || "3000"),

  settingsFile: path.resolve(process.env.SETTINGS_FILE || "slowlink.properties"),

  // Logging
  logDir: process.env.LOG_DIR ?? path.join(process.cwd(), "logs"),
  logLevel: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "development" ? "debug" : "info"),

  // Proxy overrides, applied on top of the stored settings
  proxy: {
    listenHost: process.env.LISTEN_HOST || undefined,
    listenPort: optionalInt(process.env.LISTEN_PORT),
    destinationUrl: process.env.DESTINATION_URL || undefined,
    bytesPerSecond: optionalInt(process.env.BYTES_PER_SECOND),
  },
};
