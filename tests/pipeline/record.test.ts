import { describe, expect, it } from "vitest";
import { normalizeAgreement, withAlertStatus } from "../../src/pipeline/record.ts";

describe("normalizeAgreement", () => {
  it("normalizes every field of a raw extraction", () => {
    const fields = normalizeAgreement({
      tenant_name: "Acme Traders",
      area_sqft: "ad measuring 3200 sqft",
      floor: "first floor",
      building: "JP Classic, Sector 5",
      period_of_rent: "3 years",
      rent_amount: "Rs 72 per sqft",
      maintenance: "Rs.11 per sqft + Rs. 2 for canteen",
      rent_escalation: "5",
      agreement_start_date: "2024-04-01",
      agreement_expiry_date: "2027-03-31",
      lock_in_period: "18 months",
      lock_in_period_end_date: "2025-09-30",
      rental_period_greater_than_lock_in_period: "Yes",
      next_rent_escalation: "2025-04-01",
    });

    expect(fields).toEqual({
      tenant_name: "Acme Traders",
      area_sqft: "3200",
      floor: "1st Floor",
      building: "JP Classic",
      period_of_rent: "36",
      rent_amount: "72",
      maintenance: "13",
      rent_escalation: "5%",
      agreement_start_date: "2024-04-01",
      agreement_expiry_date: "2027-03-31",
      lock_in_period: "18",
      lock_in_period_end_date: "2025-09-30",
      rental_period_greater_than_lock_in_period: true,
      next_rent_escalation: "2025-04-01",
    });
  });

  it("treats absent and null fields as empty", () => {
    const fields = normalizeAgreement({ tenant_name: null });

    expect(fields.tenant_name).toBe("");
    expect(fields.area_sqft).toBe("");
    expect(fields.floor).toBe("");
    expect(fields.agreement_expiry_date).toBe("");
    expect(fields.rental_period_greater_than_lock_in_period).toBe(false);
  });

  it("fills area, floor and building from place_occupied when area is missing", () => {
    const fields = normalizeAgreement({
      place_occupied: "1500 sqft on the ground floor of Silver Software",
    });

    expect(fields.area_sqft).toBe("1500");
    expect(fields.floor).toBe("Ground Floor");
    expect(fields.building).toBe("Silver Software");
  });

  it("ignores place_occupied when area is present", () => {
    const fields = normalizeAgreement({
      area_sqft: "900",
      floor: "2nd",
      place_occupied: "1500 sqft ground floor",
    });

    expect(fields.area_sqft).toBe("900");
    expect(fields.floor).toBe("2nd Floor");
  });

  it("keeps native booleans for the lock-in comparison", () => {
    expect(
      normalizeAgreement({ rental_period_greater_than_lock_in_period: true })
        .rental_period_greater_than_lock_in_period,
    ).toBe(true);
    expect(
      normalizeAgreement({ rental_period_greater_than_lock_in_period: "no" })
        .rental_period_greater_than_lock_in_period,
    ).toBe(false);
  });
});

describe("withAlertStatus", () => {
  it("attaches the tier for the given day without touching other fields", () => {
    const row = { id: "a-1", agreement_expiry_date: "2025-06-01" };
    const result = withAlertStatus(row, new Date(2025, 4, 15));

    expect(result).toEqual({ id: "a-1", agreement_expiry_date: "2025-06-01", alert_status: "one_month" });
    expect(row).not.toHaveProperty("alert_status");
  });

  it("gives no alert for a missing expiry date", () => {
    expect(withAlertStatus({ agreement_expiry_date: "" }).alert_status).toBe("");
  });
});
