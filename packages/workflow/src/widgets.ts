// ──────────────────────────────────────────────
// MEDIAFORGE - Widget Value Checks
// ──────────────────────────────────────────────

import type { WidgetSchema, WidgetValue } from "@mediaforge/types";

/** Returns a description of the mismatch, or null when the value fits the widget. */
export function describeWidgetMismatch(widget: WidgetSchema, value: WidgetValue): string | null {
  switch (widget.kind) {
    case "INT":
      return typeof value === "number" && Number.isSafeInteger(value)
        ? null
        : `widget "${widget.name}" expects an integer, got ${JSON.stringify(value)}`;
    case "FLOAT":
      return typeof value === "number" && Number.isFinite(value)
        ? null
        : `widget "${widget.name}" expects a finite number, got ${JSON.stringify(value)}`;
    case "STRING":
      return typeof value === "string"
        ? null
        : `widget "${widget.name}" expects a string, got ${JSON.stringify(value)}`;
    case "COMBO":
      return typeof value === "string" && value.length > 0
        ? null
        : `widget "${widget.name}" expects a non-empty option, got ${JSON.stringify(value)}`;
    case "BOOLEAN":
      return typeof value === "boolean"
        ? null
        : `widget "${widget.name}" expects a boolean, got ${JSON.stringify(value)}`;
  }
}

/**
 * Checks a positional widget list against the schema and returns every problem found.
 */
export function checkWidgetValues(widgets: WidgetSchema[], values: WidgetValue[]): string[] {
  if (values.length !== widgets.length) {
    return [`expected ${widgets.length} widget values, got ${values.length}`];
  }

  const errors: string[] = [];
  widgets.forEach((widget, index) => {
    const value = values[index];
    if (value === undefined) return;
    const mismatch = describeWidgetMismatch(widget, value);
    if (mismatch) errors.push(mismatch);
  });
  return errors;
}
