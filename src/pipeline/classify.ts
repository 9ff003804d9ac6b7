import { isBefore, isValid, parse, startOfDay, subDays } from "date-fns";
import { logger } from "../logger.ts";
import { ALERT_TIERS, type AlertTier } from "../types/agreements.ts";

// Tried in order, first valid parse wins. Day-first precedes month-first, so an
// ambiguous "01/03/2025" is 1 March.
export const EXPIRY_DATE_FORMATS = [
  "yyyy-MM-dd",
  "dd/MM/yyyy",
  "MM/dd/yyyy",
  "dd-MM-yyyy",
  "yyyy/MM/dd",
  "MM-dd-yyyy",
  "dd.MM.yyyy",
  "yyyy.MM.dd",
  "MMMM d, yyyy",
  "d MMMM yyyy",
  "MMM d, yyyy",
  "d MMM yyyy",
  "MMMM d yyyy",
  "MMM d yyyy",
] as const;

// yyyy accepts one to four digits, so "01/03/27" would otherwise parse as year 27
const MIN_YEAR = 1000;

const THREE_MONTHS_DAYS = 90;
const TWO_MONTHS_DAYS = 60;
const ONE_MONTH_DAYS = 30;

/** Parse a producer-formatted date into a local midnight, or null if no format fits. */
export function parseAgreementDate(text: string): Date | null {
  const trimmed = text.trim();
  if (trimmed === "") return null;

  // Fixed reference so parses never depend on the clock
  const reference = new Date(2000, 0, 1);
  for (const format of EXPIRY_DATE_FORMATS) {
    const parsed = parse(trimmed, format, reference);
    if (isValid(parsed) && parsed.getFullYear() >= MIN_YEAR) return startOfDay(parsed);
  }
  return null;
}

/**
 * Bucket `today` against an agreement's expiry date.
 *
 * Thresholds sit 90, 60 and 30 calendar days before expiry; each tier is closed on the
 * left and open on the right, and the expiry day itself is already "expired". An empty
 * or unreadable date yields no alert.
 */
export function calculateAlertStatus(expiryDateText: string, today: Date = new Date()): AlertTier {
  if (expiryDateText.trim() === "") return "";

  const expiry = parseAgreementDate(expiryDateText);
  if (!expiry) {
    logger.debug("Unparseable agreement expiry date", { expiry_date: expiryDateText });
    return "";
  }

  const day = startOfDay(today);
  if (isBefore(day, subDays(expiry, THREE_MONTHS_DAYS))) return "";
  if (isBefore(day, subDays(expiry, TWO_MONTHS_DAYS))) return "three_months";
  if (isBefore(day, subDays(expiry, ONE_MONTH_DAYS))) return "two_months";
  if (isBefore(day, expiry)) return "one_month";
  return "expired";
}

export function isAlertTier(value: unknown): value is AlertTier {
  return value === "" || ALERT_TIERS.some((tier) => tier === value);
}
