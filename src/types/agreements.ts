export const ALERT_TIERS = ["three_months", "two_months", "one_month", "expired"] as const;

/** Expiry-proximity classification. The empty string means no alert. */
export type AlertTier = "" | (typeof ALERT_TIERS)[number];

/** A raw value as it comes back from the extraction step. */
export type RawFieldValue = string | number | boolean | null | undefined;

export interface AgreementFields {
  tenant_name: string;
  area_sqft: string;
  floor: string;
  building: string;
  period_of_rent: string;
  rent_amount: string;
  maintenance: string;
  rent_escalation: string;
  agreement_start_date: string;
  agreement_expiry_date: string;
  lock_in_period: string;
  lock_in_period_end_date: string;
  rental_period_greater_than_lock_in_period: boolean;
  next_rent_escalation: string;
}

export type AgreementFieldName = keyof AgreementFields;

export const AGREEMENT_FIELD_NAMES = [
  "tenant_name",
  "area_sqft",
  "floor",
  "building",
  "period_of_rent",
  "rent_amount",
  "maintenance",
  "rent_escalation",
  "agreement_start_date",
  "agreement_expiry_date",
  "lock_in_period",
  "lock_in_period_end_date",
  "rental_period_greater_than_lock_in_period",
  "next_rent_escalation",
] as const satisfies readonly AgreementFieldName[];

/**
 * Input to normalization. Absent keys count as empty strings; `place_occupied` is the
 * combined location field older extractions produced before area/floor/building were split.
 */
export type RawAgreementFields = { [K in AgreementFieldName]?: RawFieldValue } & {
  place_occupied?: RawFieldValue;
};

export interface AgreementRow extends AgreementFields {
  id: string;
  source_filename: string | null;
  uploaded_at: Date;
  restored_at: Date | null;
}

export interface ArchivedAgreementRow extends AgreementRow {
  archived_at: Date;
}

export type Agreement = AgreementRow & { alert_status: AlertTier };

export interface TenantContact {
  id: string;
  tenant_name: string;
  email: string;
  created_at: Date;
}
