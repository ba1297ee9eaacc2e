/**
 * Central type exports
 */

// Configuration
export type {
  StoreConfig,
  PartialStoreConfig,
  DisplayConfig,
  ServerConfig,
  RenderConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  StoreConfigSchema,
  PartialStoreConfigSchema,
  LogLevelSchema,
} from "./config";

// Assets
export type {
  AssetKind,
  AssetFormat,
  AssetStream,
  DisplayGeometry,
  StoreSettings,
} from "./assets";
export { ASSET_FORMATS, ASSET_KINDS, assetKindFromExtension } from "./assets";
