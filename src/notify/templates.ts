import { format } from "date-fns";
import type { AgreementFields, AlertTier } from "../types/agreements.ts";

export type NotifiableTier = Exclude<AlertTier, "">;

export interface RenderedEmail {
  subject: string;
  html: string;
}

interface TierCopy {
  subject: (tenantName: string) => string;
  urgency: string;
  action: string;
  background: string;
  foreground: string;
}

const TIER_COPY: Record<NotifiableTier, TierCopy> = {
  three_months: {
    subject: (t) => `Agreement Expiry Notice - 3 Months Remaining (${t})`,
    urgency: "Notice",
    action: "Please start planning for renewal discussions.",
    background: "#fff3cd",
    foreground: "#856404",
  },
  two_months: {
    subject: (t) => `Agreement Expiry Alert - 2 Months Remaining (${t})`,
    urgency: "Alert",
    action: "Please begin renewal negotiations immediately.",
    background: "#f8d7da",
    foreground: "#721c24",
  },
  one_month: {
    subject: (t) => `URGENT: Agreement Expiry - 1 Month Remaining (${t})`,
    urgency: "URGENT",
    action: "Immediate action required for renewal or termination.",
    background: "#dc3545",
    foreground: "#ffffff",
  },
  expired: {
    subject: (t) => `CRITICAL: Agreement Expired (${t})`,
    urgency: "CRITICAL",
    action: "Agreement has expired. Please contact management immediately.",
    background: "#dc3545",
    foreground: "#ffffff",
  },
};

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function orNA(value: string): string {
  return value === "" ? "N/A" : escapeHtml(value);
}

function layout(body: string): string {
  return `<!DOCTYPE html>
<html>
<head>
  <style>
    body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; }
    .container { max-width: 600px; margin: 0 auto; padding: 20px; }
    .header { background-color: #f8f9fa; padding: 20px; border-radius: 5px; margin-bottom: 20px; }
    .details { background-color: #f8f9fa; padding: 15px; border-radius: 5px; margin: 15px 0; }
    .footer { margin-top: 30px; padding-top: 20px; border-top: 1px solid #dee2e6; font-size: 0.9em; color: #6c757d; }
  </style>
</head>
<body>
  <div class="container">
${body}
  </div>
</body>
</html>`;
}

export function buildAlertEmail(
  tenantName: string,
  agreement: AgreementFields,
  tier: NotifiableTier,
  now: Date = new Date(),
): RenderedEmail {
  const copy = TIER_COPY[tier];
  const rent = agreement.rent_amount === "" ? "N/A" : `Rs ${escapeHtml(agreement.rent_amount)}/sqft/month`;

  const body = `    <div class="header">
      <h2>Tenant Agreement Alert</h2>
      <p><strong>Tenant:</strong> ${escapeHtml(tenantName)}</p>
      <p><strong>Date:</strong> ${format(now, "MMMM d, yyyy")}</p>
    </div>
    <div class="alert-${tier}" style="background-color: ${copy.background}; color: ${copy.foreground}; padding: 15px; border-radius: 5px; font-weight: bold;">
      <h3>${copy.urgency}: Agreement Expiry ${copy.urgency}</h3>
      <p>${copy.action}</p>
    </div>
    <div class="details">
      <h4>Agreement Details:</h4>
      <p><strong>Area:</strong> ${orNA(agreement.area_sqft)} sqft</p>
      <p><strong>Floor:</strong> ${orNA(agreement.floor)}</p>
      <p><strong>Building:</strong> ${orNA(agreement.building)}</p>
      <p><strong>Agreement Start Date:</strong> ${orNA(agreement.agreement_start_date)}</p>
      <p><strong>Agreement Expiry Date:</strong> ${orNA(agreement.agreement_expiry_date)}</p>
      <p><strong>Rent Amount:</strong> ${rent}</p>
      <p><strong>Lock-in Period End:</strong> ${orNA(agreement.lock_in_period_end_date)}</p>
    </div>
    <p>This is an automated notification from your Tenant Dashboard system. Please contact the property management team if you have any questions or need to discuss renewal options.</p>
    <div class="footer">
      <p>This email was sent from the Tenant Dashboard System.<br>Please do not reply directly to this email.</p>
    </div>`;

  return { subject: copy.subject(tenantName), html: layout(body) };
}

export function buildTestEmail(now: Date = new Date()): RenderedEmail {
  const body = `    <div class="header">
      <h2>Test Email from Tenant Dashboard</h2>
      <p>This is a test email to verify your email configuration is working correctly.</p>
      <p><strong>Sent at:</strong> ${format(now, "MMMM d, yyyy 'at' hh:mm a")}</p>
    </div>
    <p>If you received this email, your SMTP configuration is working.</p>`;

  return { subject: "Test Email from Tenant Dashboard", html: layout(body) };
}
