export * from "./lib/thumbnails";
export { logger, createLogger } from "./lib/logger";
