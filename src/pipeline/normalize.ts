import type { RawFieldValue } from "../types/agreements.ts";

// Every normalizer here is total and idempotent: stored values are fed back through
// them, so a canonical output must map to itself.

const INTEGER_PATTERN = /\d+/;
const DECIMAL_PATTERN = /\d+\.?\d*/;
const ALL_DECIMALS_PATTERN = /\d+\.?\d*/g;

function toText(value: RawFieldValue): string {
  if (value === null || value === undefined) return "";
  return String(value).trim();
}

/**
 * Convert a rent or lock-in period to a month count.
 *
 * The first integer in the text is the quantity; "year" multiplies it by 12, "month"
 * keeps it, "quarter" multiplies by 3. A bare number is taken as months.
 */
export function normalizePeriodToMonths(value: RawFieldValue): string {
  const text = toText(value).toLowerCase();
  const match = INTEGER_PATTERN.exec(text);
  if (!match) return "";

  // BigInt keeps long digit runs out of exponent notation
  const quantity = BigInt(match[0]);
  if (text.includes("year")) return String(quantity * 12n);
  if (text.includes("month")) return String(quantity);
  if (text.includes("quarter")) return String(quantity * 3n);
  return String(quantity);
}

/** First number in the text, fraction included, exactly as written. */
export function normalizeRentAmount(value: RawFieldValue): string {
  const match = DECIMAL_PATTERN.exec(toText(value));
  return match ? match[0] : "";
}

/**
 * Total of every number in the text, for composite charges such as
 * "Rs.11 per sqft + Rs. 2 for canteen".
 */
export function normalizeMaintenance(value: RawFieldValue): string {
  const numbers = toText(value).match(ALL_DECIMALS_PATTERN);
  if (!numbers) return "";

  const total = numbers.reduce((sum, n) => sum + Number.parseFloat(n), 0);
  return plainDecimal(total);
}

// String() switches to exponent form below 1e-6 and from 1e21 up; digits only here
function plainDecimal(n: number): string {
  const text = String(n);
  if (!text.includes("e")) return text;
  if (Number.isInteger(n)) return BigInt(n).toString();
  return n.toFixed(20).replace(/\.?0+$/, "");
}

/** First number in the text with a trailing percent sign. */
export function normalizeRentEscalation(value: RawFieldValue): string {
  const match = DECIMAL_PATTERN.exec(toText(value));
  return match ? `${match[0]}%` : "";
}

/** First whole number in the text. Areas are never fractional. */
export function normalizeAreaSqft(value: RawFieldValue): string {
  const match = INTEGER_PATTERN.exec(toText(value));
  return match ? match[0] : "";
}

interface FloorRule {
  label: string;
  contains: readonly string[];
  equals: readonly string[];
}

const FLOOR_RULES: readonly FloorRule[] = [
  { label: "Ground Floor", contains: ["ground", "g.f"], equals: ["gf", "0"] },
  { label: "1st Floor", contains: ["1st", "first"], equals: ["1", "f1"] },
  { label: "2nd Floor", contains: ["2nd", "second"], equals: ["2", "f2"] },
  { label: "3rd Floor", contains: ["3rd", "third"], equals: ["3", "f3"] },
  { label: "4th Floor", contains: ["4th", "fourth"], equals: ["4", "f4"] },
  { label: "5th Floor", contains: ["5th", "fifth"], equals: ["5", "f5"] },
];

/** Map floor descriptions onto a fixed label set; anything unrecognized passes through. */
export function normalizeFloor(value: RawFieldValue): string {
  const text = toText(value);
  const lowered = text.toLowerCase();

  const rule = FLOOR_RULES.find(
    (r) => r.contains.some((s) => lowered.includes(s)) || r.equals.includes(lowered),
  );
  return rule ? rule.label : text;
}

const BUILDING_RULES: ReadonlyArray<{ label: string; contains: readonly string[] }> = [
  { label: "JP Classic", contains: ["jp classic", "jp-classic"] },
  { label: "Silver Software", contains: ["silver software", "silver-software"] },
];

/** Map building mentions onto the known building names; anything else passes through. */
export function normalizeBuilding(value: RawFieldValue): string {
  const text = toText(value);
  const lowered = text.toLowerCase();

  const rule = BUILDING_RULES.find((r) => r.contains.some((s) => lowered.includes(s)));
  return rule ? rule.label : text;
}

const TRUE_WORDS = new Set(["yes", "true", "1"]);

/** Anything that is not an explicit yes is false, including empty input. */
export function parseBooleanFlag(value: RawFieldValue): boolean {
  if (typeof value === "boolean") return value;
  return TRUE_WORDS.has(toText(value).toLowerCase());
}

export function formatBooleanFlag(flag: boolean): "True" | "False" {
  return flag ? "True" : "False";
}

export function normalizeBooleanFlag(value: RawFieldValue): "True" | "False" {
  return formatBooleanFlag(parseBooleanFlag(value));
}
