/**
 * @fileoverview Adapter barrel exports
 *
 * Node implementations of the domain ports.
 *
 * @module adapters
 */

export * from "./pdfjs/index.js";
export * from "./storage/index.js";
export * from "./workspace/index.js";
