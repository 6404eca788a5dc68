/**
 * Reads a uiautomator accessibility dump into a flat list of elements a
 * decision-maker can act on.
 */

import { XMLParser } from "fast-xml-parser";
import type { UIElement } from "@sidescreen/shared";

import type { Logger } from "./logger.js";

const TAG = "Sanitizer";

type XmlNode = { [key: string]: unknown };

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function attr(node: XmlNode, name: string): string {
  const value = node[`@_${name}`];
  return typeof value === "string" ? value : "";
}

function flag(node: XmlNode, name: string): boolean {
  return attr(node, name) === "true";
}

/** "[x1,y1][x2,y2]" -> [x1, y1, x2, y2], or null when malformed. */
export function parseBounds(bounds: string): [number, number, number, number] | null {
  const match = bounds.match(/^\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]$/);
  if (!match) return null;
  return [Number(match[1]), Number(match[2]), Number(match[3]), Number(match[4])];
}

function suggestAction(
  editable: boolean,
  clickable: boolean,
  longClickable: boolean,
  scrollable: boolean
): UIElement["action"] {
  if (editable) return "type";
  if (longClickable && !clickable) return "longpress";
  if (scrollable && !clickable) return "scroll";
  if (clickable) return "tap";
  return "read";
}

/**
 * Returns the interactive or labelled nodes of a dump, each with its state
 * flags and the label of its nearest labelled ancestor. Zero-size nodes are
 * skipped; their children are still visited.
 */
export function getInteractiveElements(xmlContent: string, logger?: Logger): UIElement[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    allowBooleanAttributes: true,
  });

  let parsed: unknown;
  try {
    parsed = parser.parse(xmlContent, true);
  } catch (err) {
    logger?.warn(TAG, "Could not parse accessibility dump, the screen might be loading", err);
    return [];
  }

  const elements: UIElement[] = [];

  const walkChildren = (node: XmlNode, parentLabel: string, depth: number): void => {
    const children = node.node;
    if (Array.isArray(children)) {
      for (const child of children) walk(child, parentLabel, depth);
    } else if (children !== undefined) {
      walk(children, parentLabel, depth);
    }
    if (node.hierarchy !== undefined) {
      walk(node.hierarchy, parentLabel, depth);
    }
  };

  const walk = (value: unknown, parentLabel: string, depth: number): void => {
    if (!isNode(value)) return;

    const bounds = attr(value, "bounds");
    if (!bounds) {
      walkChildren(value, parentLabel, depth);
      return;
    }

    const className = attr(value, "class");
    const typeName = className.split(".").pop() ?? "";
    const text = attr(value, "text");
    const desc = attr(value, "content-desc");
    const resourceId = attr(value, "resource-id");

    const clickable = flag(value, "clickable");
    const longClickable = flag(value, "long-clickable");
    const scrollable = flag(value, "scrollable");
    const editable =
      className.includes("EditText") || className.includes("AutoCompleteTextView") || flag(value, "editable");

    const rect = parseBounds(bounds);
    const interesting = clickable || editable || longClickable || scrollable || Boolean(text || desc);
    if (rect && interesting) {
      const [x1, y1, x2, y2] = rect;
      const width = x2 - x1;
      const height = y2 - y1;
      if (width > 0 && height > 0) {
        elements.push({
          id: resourceId,
          text: text || desc,
          type: typeName,
          bounds,
          center: [Math.floor((x1 + x2) / 2), Math.floor((y1 + y2) / 2)],
          size: [width, height],
          clickable,
          editable,
          enabled: attr(value, "enabled") !== "false",
          checked: flag(value, "checked"),
          focused: flag(value, "focused"),
          selected: flag(value, "selected"),
          scrollable,
          longClickable,
          password: flag(value, "password"),
          hint: attr(value, "hint"),
          action: suggestAction(editable, clickable, longClickable, scrollable),
          parent: parentLabel,
          depth,
        });
      }
    }

    const label = text || desc || resourceId.split("/").pop() || typeName;
    walkChildren(value, label, depth + 1);
  };

  walk(parsed, "root", 0);
  return elements;
}

// ===========================================
// Element filtering
// ===========================================

/** What a decision-maker needs of an element; default-valued flags are left out. */
export interface CompactUIElement {
  text: string;
  center: [number, number];
  action: UIElement["action"];
  enabled?: false;
  checked?: true;
  focused?: true;
  hint?: string;
  editable?: true;
  scrollable?: true;
}

export function compactElement(el: UIElement): CompactUIElement {
  const compact: CompactUIElement = { text: el.text, center: el.center, action: el.action };
  if (!el.enabled) compact.enabled = false;
  if (el.checked) compact.checked = true;
  if (el.focused) compact.focused = true;
  if (el.hint) compact.hint = el.hint;
  if (el.editable) compact.editable = true;
  if (el.scrollable) compact.scrollable = true;
  return compact;
}

function scoreElement(el: UIElement): number {
  let score = 0;
  if (el.enabled) score += 10;
  if (el.editable) score += 8;
  if (el.focused) score += 6;
  if (el.clickable || el.longClickable) score += 5;
  if (el.text) score += 3;
  return score;
}

/**
 * Collapses elements whose centers share a 5px bucket (keeping the higher
 * scored one) and returns the best `limit` in compact form.
 */
export function filterElements(elements: UIElement[], limit: number): CompactUIElement[] {
  const seen = new Map<string, UIElement>();
  for (const el of elements) {
    const key = `${Math.round(el.center[0] / 5) * 5},${Math.round(el.center[1] / 5) * 5}`;
    const existing = seen.get(key);
    if (!existing || scoreElement(el) > scoreElement(existing)) {
      seen.set(key, el);
    }
  }
  return Array.from(seen.values())
    .sort((a, b) => scoreElement(b) - scoreElement(a))
    .slice(0, limit)
    .map(compactElement);
}
