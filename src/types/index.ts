/**
 * pg-maint - Type exports
 */

export * from "./database.js";
export * from "./errors.js";
export * from "./maintenance.js";
