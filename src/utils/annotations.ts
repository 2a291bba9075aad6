/**
 * Tool Annotations Presets
 *
 * Reusable annotation configurations shared by the tool definition files.
 */

import type { ToolAnnotations } from "../types/index.js";

/** Catalog and SELECT tools */
export const READ_ONLY: ToolAnnotations = {
  readOnlyHint: true,
  destructiveHint: false,
};

/** Tools that may change data (INSERT, UPDATE, DELETE, procedures) */
export const DESTRUCTIVE: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: true,
};

/**
 * Create read-only annotations with title
 */
export function readOnly(title: string): ToolAnnotations {
  return { title, ...READ_ONLY };
}

/**
 * Create destructive annotations with title
 */
export function destructive(title: string): ToolAnnotations {
  return { title, ...DESTRUCTIVE };
}
