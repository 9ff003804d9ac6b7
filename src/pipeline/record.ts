import type {
  AgreementFields,
  AgreementRow,
  AlertTier,
  RawAgreementFields,
  RawFieldValue,
} from "../types/agreements.ts";
import { calculateAlertStatus } from "./classify.ts";
import {
  normalizeAreaSqft,
  normalizeBuilding,
  normalizeFloor,
  normalizeMaintenance,
  normalizePeriodToMonths,
  normalizeRentAmount,
  normalizeRentEscalation,
  parseBooleanFlag,
} from "./normalize.ts";

function text(value: RawFieldValue): string {
  return value === null || value === undefined ? "" : String(value);
}

/** Apply every field normalizer to a raw extraction. Absent keys count as empty. */
export function normalizeAgreement(raw: RawAgreementFields): AgreementFields {
  let { area_sqft, floor, building } = raw;

  // Older extractions carried area, floor and building in one place_occupied string
  if (raw.place_occupied !== undefined && !area_sqft) {
    area_sqft = raw.place_occupied;
    floor = raw.place_occupied;
    building = raw.place_occupied;
  }

  return {
    tenant_name: text(raw.tenant_name),
    area_sqft: normalizeAreaSqft(area_sqft),
    floor: normalizeFloor(floor),
    building: normalizeBuilding(building),
    period_of_rent: normalizePeriodToMonths(raw.period_of_rent),
    rent_amount: normalizeRentAmount(raw.rent_amount),
    maintenance: normalizeMaintenance(raw.maintenance),
    rent_escalation: normalizeRentEscalation(raw.rent_escalation),
    agreement_start_date: text(raw.agreement_start_date),
    agreement_expiry_date: text(raw.agreement_expiry_date),
    lock_in_period: normalizePeriodToMonths(raw.lock_in_period),
    lock_in_period_end_date: text(raw.lock_in_period_end_date),
    rental_period_greater_than_lock_in_period: parseBooleanFlag(
      raw.rental_period_greater_than_lock_in_period,
    ),
    next_rent_escalation: text(raw.next_rent_escalation),
  };
}

/** Attach a freshly computed alert tier. Stored tiers are never trusted. */
export function withAlertStatus<T extends Pick<AgreementRow, "agreement_expiry_date">>(
  row: T,
  today: Date = new Date(),
): T & { alert_status: AlertTier } {
  return { ...row, alert_status: calculateAlertStatus(row.agreement_expiry_date, today) };
}
