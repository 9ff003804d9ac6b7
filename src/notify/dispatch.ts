import { logger } from "../logger.ts";
import type { Agreement, TenantContact } from "../types/agreements.ts";
import type { NotificationSender } from "./email.ts";
import { buildAlertEmail } from "./templates.ts";

export interface DispatchSummary {
  sent: number;
  failed: number;
  no_contact: number;
  no_tenant: number;
}

export function findContactEmail(
  tenantName: string,
  contacts: readonly Pick<TenantContact, "tenant_name" | "email">[],
): string | null {
  const wanted = tenantName.trim().toLowerCase();
  const match = contacts.find((c) => c.tenant_name.trim().toLowerCase() === wanted);
  return match ? match.email : null;
}

/**
 * Email every tenant whose agreement currently sits in an alert tier. Sends run one at a
 * time; a failed send is counted and the rest continue.
 */
export async function dispatchAlerts(
  agreements: readonly Agreement[],
  contacts: readonly Pick<TenantContact, "tenant_name" | "email">[],
  sender: NotificationSender,
  now: Date = new Date(),
): Promise<DispatchSummary> {
  const summary: DispatchSummary = { sent: 0, failed: 0, no_contact: 0, no_tenant: 0 };

  for (const agreement of agreements) {
    const tier = agreement.alert_status;
    if (tier === "") continue;

    const tenantName = agreement.tenant_name.trim();
    if (!tenantName) {
      summary.no_tenant++;
      logger.warn("Alerting agreement has no tenant name", { agreement_id: agreement.id });
      continue;
    }

    const email = findContactEmail(tenantName, contacts);
    if (!email) {
      summary.no_contact++;
      logger.warn("No contact address for tenant", { tenant_name: tenantName });
      continue;
    }

    const { subject, html } = buildAlertEmail(tenantName, agreement, tier, now);
    const result = await sender.send({ to: email, subject, html });
    if (result.ok) {
      summary.sent++;
      logger.info("Alert email sent", { tenant_name: tenantName, alert_status: tier });
    } else {
      summary.failed++;
      logger.error("Alert email failed", { tenant_name: tenantName, error: result.error });
    }
  }

  return summary;
}
