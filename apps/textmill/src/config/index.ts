/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadConfig,
    loadConfigWithFallback,
    applyEnvironment,
    getDefaultConfig,
    type TextmillConfig,
} from "./loadConfig.js";
