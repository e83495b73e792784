/**
 * @tinyhop/shared - Shared Package Exports
 *
 * Central export point for shared types, utilities, constants and errors.
 * Import from "@tinyhop/shared", never from internal paths.
 */

// Types (UrlRecord, UrlView, ListOptions, etc.)
export * from "./types/index.js";

// Utilities (identifier codec, validation, presentation, abort)
export * from "./utils/index.js";

// Constants (ID_CONFIG, URL_CONFIG, reserved words)
export * from "./constants/index.js";

// Errors (ServiceError, ErrorCode, factories)
export * from "./errors/index.js";
