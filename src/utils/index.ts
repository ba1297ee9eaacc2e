/**
 * Utility exports
 */

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";

// SVG utilities
export { wrapSvgDocument, SVG_NAMESPACE } from "./wrap-svg-document";

// Classes
export { Logger } from "./logger";
