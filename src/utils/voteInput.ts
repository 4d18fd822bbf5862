import { MAX_TITLE_LENGTH, OPTION_TYPES } from "../constants/voting";
import { NewOption, OptionType } from "../types/voting";

export type ParseResult<T> = { success: true; value: T } | { success: false; message: string };

export const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export function parseTitle(value: unknown, label = "Title"): ParseResult<string> {
  const title = typeof value === "string" ? value.trim() : "";
  if (!title) return { success: false, message: `${label} is required` };
  if (title.length > MAX_TITLE_LENGTH) {
    return { success: false, message: `${label} must be at most ${MAX_TITLE_LENGTH} characters` };
  }
  return { success: true, value: title };
}

/** Accepts undefined (field left out), null (cleared) or a parseable date. */
export function parseOptionalDate(value: unknown, label: string): ParseResult<Date | null | undefined> {
  if (value === undefined) return { success: true, value: undefined };
  if (value === null || value === "") return { success: true, value: null };
  if (typeof value !== "string" && typeof value !== "number") {
    return { success: false, message: `${label} must be a date` };
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return { success: false, message: `${label} must be a date` };
  }
  return { success: true, value: date };
}

export function isValidWindow(startsAt: Date | null, endsAt: Date | null) {
  return !startsAt || !endsAt || endsAt > startsAt;
}

const isOptionType = (value: unknown): value is OptionType =>
  OPTION_TYPES.some((type) => type === value);

function parseDisplayOrder(value: unknown): ParseResult<number> {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    return { success: false, message: "Display order must be a non-negative integer" };
  }
  return { success: true, value };
}

/**
 * Parses a new option. Text options without content use their title as
 * content; `fallbackOrder` is used when no displayOrder is given.
 */
export function parseNewOption(body: unknown, fallbackOrder: number): ParseResult<NewOption> {
  if (!isPlainObject(body)) return { success: false, message: "Option must be an object" };

  const optionType = body.optionType ?? "text";
  if (!isOptionType(optionType)) {
    return { success: false, message: `Option type must be one of: ${OPTION_TYPES.join(", ")}` };
  }

  const title = parseTitle(body.title, "Option title");
  if (!title.success) return title;

  let displayOrder = fallbackOrder;
  if (body.displayOrder !== undefined) {
    const order = parseDisplayOrder(body.displayOrder);
    if (!order.success) return order;
    displayOrder = order.value;
  }

  const content =
    typeof body.content === "string" && body.content.trim()
      ? body.content.trim()
      : optionType === "text"
        ? title.value
        : "";

  return { success: true, value: { optionType, title: title.value, content, displayOrder } };
}

export function parseOptionPatch(body: unknown): ParseResult<Partial<NewOption>> {
  if (!isPlainObject(body)) return { success: false, message: "Option must be an object" };

  const patch: Partial<NewOption> = {};
  if (body.title !== undefined) {
    const title = parseTitle(body.title, "Option title");
    if (!title.success) return title;
    patch.title = title.value;
  }
  if (body.content !== undefined) {
    if (typeof body.content !== "string") return { success: false, message: "Content must be a string" };
    patch.content = body.content.trim();
  }
  if (body.displayOrder !== undefined) {
    const order = parseDisplayOrder(body.displayOrder);
    if (!order.success) return order;
    patch.displayOrder = order.value;
  }
  return { success: true, value: patch };
}

export function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

export function parsePage(value: unknown, fallback: number, max = Number.MAX_SAFE_INTEGER) {
  const parsed = Number.parseInt(queryString(value) ?? "", 10);
  if (!Number.isInteger(parsed) || parsed < 1) return fallback;
  return Math.min(parsed, max);
}
