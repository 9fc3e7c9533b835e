import { asContainer, asTextUnit } from "~/types/deck";
import type { Shape, TextUnit } from "~/types/deck";
import type { TokenMap } from "~/types/qbr";

export const CHART_TOKEN = "CHART_PLACEHOLDER";

const TOKEN_PATTERN = /\{\{([A-Za-z0-9_]+)\}\}/g;

export function wrapToken(identifier: string) {
  return `{{${identifier}}}`;
}

/** Identifiers of the `{{TOKEN}}` markers present in a text, in order of first appearance. */
export function findTokens(text: string): string[] {
  const found = new Set<string>();
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    found.add(match[1]);
  }
  return [...found];
}

export function findMissingTokens(tokens: TokenMap, required: readonly string[]): string[] {
  return required.filter((identifier) => !tokens[identifier]?.trim());
}

function resolveUnit(unit: TextUnit, entries: Array<[string, string]>) {
  let changed = 0;
  for (const run of unit.runs) {
    const original = run.text;
    let next = original;
    for (const [marker, value] of entries) {
      if (next.includes(marker)) {
        next = next.split(marker).join(value);
      }
    }
    if (next !== original) {
      run.setText(next);
      changed += 1;
    }
  }
  return changed;
}

function visit(shape: Shape, entries: Array<[string, string]>): number {
  const unit = asTextUnit(shape);
  if (unit) {
    return resolveUnit(unit, entries);
  }
  const children = asContainer(shape);
  if (children) {
    return children.reduce((total, child) => total + visit(child, entries), 0);
  }
  if (shape.kind === "table") {
    return shape.rows.reduce(
      (total, row) => total + row.reduce((rowTotal, cell) => rowTotal + resolveUnit(cell, entries), 0),
      0
    );
  }
  return 0;
}

/**
 * Replaces `{{TOKEN}}` markers in every text run of the shape, descending into
 * groups and table cells. Markers without a value in `tokens` are left as they
 * are. Returns the number of runs that changed.
 */
export function resolvePlaceholders(shape: Shape, tokens: TokenMap): number {
  const entries = Object.entries(tokens).map(([identifier, value]): [string, string] => [wrapToken(identifier), value]);
  return visit(shape, entries);
}

/** All text of a shape and its descendants. */
export function shapeText(shape: Shape): string {
  switch (shape.kind) {
    case "text":
      return shape.body.text;
    case "group":
      return shape.children.map(shapeText).join("\n");
    case "table":
      return shape.rows.map((row) => row.map((cell) => cell.text).join("\t")).join("\n");
    case "other":
      return "";
  }
}
