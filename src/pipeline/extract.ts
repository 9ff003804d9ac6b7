import { generateObject } from "ai";
import { z } from "zod";
import { getExtractionModel } from "../providers.ts";
import type { RawAgreementFields } from "../types/agreements.ts";

const textField = z.string().nullable();

const ExtractionSchema = z.object({
  tenant_name: textField,
  area_sqft: textField.describe("e.g. '3200' from 'ad measuring 3200 sqft'"),
  floor: textField.describe("e.g. 'Ground Floor', '1st Floor'"),
  building: textField.describe("building name, usually 'JP Classic' or 'Silver Software'"),
  period_of_rent: textField.describe("length of the tenancy as a month count, e.g. '24'"),
  rent_amount: textField.describe("rent per sqft per month, number only"),
  maintenance: textField.describe("total maintenance per sqft per month, every component added"),
  rent_escalation: textField.describe("escalation percentage, e.g. '5%'"),
  agreement_start_date: textField.describe("YYYY-MM-DD"),
  agreement_expiry_date: textField.describe("YYYY-MM-DD"),
  lock_in_period: textField.describe("lock-in length as a month count"),
  lock_in_period_end_date: textField.describe("YYYY-MM-DD"),
  rental_period_greater_than_lock_in_period: z.union([z.boolean(), z.string()]).nullable(),
  next_rent_escalation: textField.describe("YYYY-MM-DD"),
});

const SYSTEM_PROMPT = `You read rental agreements and pull out their commercial terms.

Return one value per field. Use null when the agreement does not state a value; never guess.
Dates are YYYY-MM-DD. Amounts and periods are plain numbers without currency or units, except
rent_escalation which keeps its percent sign.`;

export interface ExtractResult {
  fields: RawAgreementFields;
  model_id: string;
  input_tokens: number;
  output_tokens: number;
}

export async function extractAgreementFields(fullText: string): Promise<ExtractResult> {
  const descriptor = getExtractionModel();
  const { object, usage } = await generateObject({
    model: descriptor.model,
    schema: ExtractionSchema,
    maxOutputTokens: 1_024,
    system: SYSTEM_PROMPT,
    prompt: fullText,
  });

  return {
    fields: object,
    model_id: descriptor.modelId,
    input_tokens: usage.inputTokens ?? 0,
    output_tokens: usage.outputTokens ?? 0,
  };
}
