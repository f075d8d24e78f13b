import { join } from "path";
import { z } from "zod";
import { InvalidConfigError } from "./errors";

const configSchema = z.object({
  cachePath: z.string().min(1),
  /** JPEG quality, also used for WebP output */
  jpegQuality: z.number().int().min(1).max(100),
  /** zlib level for PNG output */
  pngCompression: z.number().int().min(1).max(9),
  /** Transcode generated thumbnails to WebP and serve WebP entries first */
  webp: z.boolean(),
  /** Maximum concurrent generations per pipeline */
  concurrency: z.number().int().min(1),
});

export type ThumbnailerConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

const TRUE_VALUES = ["1", "true", "yes", "on"];
const FALSE_VALUES = ["0", "false", "no", "off"];

/**
 * Default cache location: ./data/thumbnails relative to the working directory.
 */
export function getDefaultCachePath(): string {
  return join(process.cwd(), "data", "thumbnails");
}

function parseNumber(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  return Number(raw.trim());
}

function parseBoolean(raw: string | undefined): boolean | string | undefined {
  if (!raw) return undefined;
  const value = raw.trim().toLowerCase();
  if (TRUE_VALUES.includes(value)) return true;
  if (FALSE_VALUES.includes(value)) return false;
  // Left as a string so validation reports it
  return raw;
}

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Resolve the pipeline configuration.
 * Precedence: explicit options, then THUMBNAIL_* environment variables, then defaults.
 *
 * @throws InvalidConfigError when a value is out of range or malformed
 */
export function resolveConfig(options: Partial<ThumbnailerConfig> = {}, env: Env = process.env): ThumbnailerConfig {
  const fromEnv = {
    cachePath: env.THUMBNAIL_CACHE_PATH || undefined,
    jpegQuality: parseNumber(env.THUMBNAIL_JPEG_QUALITY),
    pngCompression: parseNumber(env.THUMBNAIL_PNG_COMPRESSION),
    webp: parseBoolean(env.THUMBNAIL_WEBP),
    concurrency: parseNumber(env.THUMBNAIL_CONCURRENCY),
  };

  const result = configSchema.safeParse({
    cachePath: getDefaultCachePath(),
    jpegQuality: 75,
    pngCompression: 5,
    webp: false,
    concurrency: 4,
    ...withoutUndefined(fromEnv),
    ...withoutUndefined(options),
  });

  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return result.data;
}
