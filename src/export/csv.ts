import { format } from "date-fns";
import { parse } from "json2csv";
import { formatBooleanFlag } from "../pipeline/normalize.ts";
import type { Agreement } from "../types/agreements.ts";

function suffixed(value: string, suffix: string): string {
  return value === "" ? "" : `${value}${suffix}`;
}

function rupees(value: string): string {
  return value === "" ? "" : `Rs ${value}`;
}

const COLUMNS = [
  { label: "Tenant Name", value: (a: Agreement) => a.tenant_name },
  { label: "Area (sqft)", value: (a: Agreement) => suffixed(a.area_sqft, " sqft") },
  { label: "Floor", value: (a: Agreement) => a.floor },
  { label: "Building", value: (a: Agreement) => a.building },
  { label: "Period of Rent (Months)", value: (a: Agreement) => suffixed(a.period_of_rent, " months") },
  { label: "Rent Amount (Rs/sqft/month)", value: (a: Agreement) => rupees(a.rent_amount) },
  { label: "Maintenance (Rs/sqft/month)", value: (a: Agreement) => rupees(a.maintenance) },
  { label: "Rent Escalation (% per year)", value: (a: Agreement) => a.rent_escalation },
  { label: "Agreement Start Date", value: (a: Agreement) => a.agreement_start_date },
  { label: "Agreement Expiry Date", value: (a: Agreement) => a.agreement_expiry_date },
  { label: "Lock In Period (Months)", value: (a: Agreement) => suffixed(a.lock_in_period, " months") },
  { label: "Lock In Period End Date", value: (a: Agreement) => a.lock_in_period_end_date },
  {
    label: "Rental Period > Lock In Period",
    value: (a: Agreement) => formatBooleanFlag(a.rental_period_greater_than_lock_in_period),
  },
  { label: "Next Rent Escalation", value: (a: Agreement) => a.next_rent_escalation },
  { label: "Alert Status", value: (a: Agreement) => a.alert_status },
];

export function toAgreementsCsv(agreements: readonly Agreement[]): string {
  return parse<Agreement>(agreements, { fields: COLUMNS, eol: "\n" });
}

export function csvFilename(now: Date = new Date()): string {
  return `tenant_agreements_${format(now, "yyyyMMdd_HHmmss")}.csv`;
}
