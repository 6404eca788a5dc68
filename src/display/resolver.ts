/**
 * Recovers a virtual display's id from the display listing.
 *
 * The listing is free text with no stable format, so this is a best-effort
 * scan: the first line that mentions the session name (or the generic
 * virtual-display marker) and carries a recognized `key=<int>` token wins.
 * When nothing matches, the configured fallback id is returned.
 */

import { DEFAULT_FALLBACK_DISPLAY_ID, VIRTUAL_DISPLAY_MARKER } from "../constants.js";

export interface ResolveOptions {
  name: string;
  marker?: string;
  fallbackId?: number;
}

export interface ResolvedDisplayId {
  displayId: number;
  /** "listing" when read from the output, "fallback" when the default was used. */
  source: "listing" | "fallback";
  line?: string;
}

const ID_TOKEN = /\b(?:displayId|mDisplayId)=(\d+)/;

/** Returns the id on one line, or null when the line is not a match. */
export function matchDisplayLine(line: string, name: string, marker = VIRTUAL_DISPLAY_MARKER): number | null {
  if (!line.includes(name) && !line.includes(marker)) return null;
  const match = ID_TOKEN.exec(line);
  if (!match) return null;
  const id = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(id) ? id : null;
}

export function resolveDisplayId(listing: string, options: ResolveOptions): ResolvedDisplayId {
  const marker = options.marker ?? VIRTUAL_DISPLAY_MARKER;
  for (const line of listing.split(/\r?\n/)) {
    const id = matchDisplayLine(line, options.name, marker);
    if (id !== null) {
      return { displayId: id, source: "listing", line: line.trim() };
    }
  }
  return { displayId: options.fallbackId ?? DEFAULT_FALLBACK_DISPLAY_ID, source: "fallback" };
}
