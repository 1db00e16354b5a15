export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

export interface FlacConfig {
  /** Vendor string written when a file has no vorbis comment block yet. */
  vendor: string;
  /** Description stored in the picture block of embedded cover art. */
  coverDescription: string;
  logger: Logger;
}

export const consoleLogger: Logger = {
  info: (message) => console.log(`[Metadata] ${message}`),
  warn: (message) => console.warn(`[Metadata] Warning: ${message}`),
};

export const defaultConfig: Readonly<FlacConfig> = Object.freeze({
  vendor: "flacmeta 0.1.0",
  coverDescription: "Front Cover",
  logger: consoleLogger,
});

export function resolveConfig(options?: Partial<FlacConfig>): FlacConfig {
  return {
    vendor: options?.vendor ?? defaultConfig.vendor,
    coverDescription: options?.coverDescription ??
      defaultConfig.coverDescription,
    logger: options?.logger ?? defaultConfig.logger,
  };
}
