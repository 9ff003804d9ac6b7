import { beforeEach, describe, expect, it, vi } from "vitest";

const sendMail = vi.hoisted(() => vi.fn());

vi.mock("nodemailer", () => ({
  default: { createTransport: vi.fn(() => ({ sendMail })) },
}));

import nodemailer from "nodemailer";
import { createSmtpSender, type SmtpSettings } from "../../src/notify/email.ts";

const SETTINGS: SmtpSettings = {
  host: "smtp.example.test",
  port: 587,
  user: "alerts@example.test",
  password: "test-password",
  senderName: "Tenant Dashboard",
};

const MESSAGE = { to: "accounts@acme.test", subject: "Hello", html: "<p>Hi</p>" };

describe("createSmtpSender", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    sendMail.mockResolvedValue({ messageId: "<msg-1@example.test>" });
  });

  it("sends from the configured sender over STARTTLS", async () => {
    const sender = createSmtpSender({ ...SETTINGS, senderEmail: "noreply@example.test" });
    const result = await sender.send(MESSAGE);

    expect(result).toEqual({ ok: true, messageId: "<msg-1@example.test>" });
    expect(vi.mocked(nodemailer.createTransport)).toHaveBeenCalledWith({
      host: "smtp.example.test",
      port: 587,
      secure: false,
      auth: { user: "alerts@example.test", pass: "test-password" },
    });
    expect(sendMail).toHaveBeenCalledWith({
      from: '"Tenant Dashboard" <noreply@example.test>',
      to: "accounts@acme.test",
      subject: "Hello",
      html: "<p>Hi</p>",
    });
  });

  it("falls back to the SMTP user as sender", async () => {
    await createSmtpSender(SETTINGS).send(MESSAGE);

    expect(sendMail.mock.calls[0]?.[0]).toMatchObject({
      from: '"Tenant Dashboard" <alerts@example.test>',
    });
  });

  it("reuses one transport across sends", async () => {
    const sender = createSmtpSender(SETTINGS);
    await sender.send(MESSAGE);
    await sender.send(MESSAGE);

    expect(vi.mocked(nodemailer.createTransport)).toHaveBeenCalledTimes(1);
    expect(sendMail).toHaveBeenCalledTimes(2);
  });

  it("fails without a sender address", async () => {
    const result = await createSmtpSender({ ...SETTINGS, user: undefined }).send(MESSAGE);

    expect(result).toEqual({ ok: false, error: "No sender email configured" });
    expect(sendMail).not.toHaveBeenCalled();
  });

  it("fails without a password", async () => {
    const result = await createSmtpSender({ ...SETTINGS, password: undefined }).send(MESSAGE);

    expect(result).toEqual({ ok: false, error: "Missing SMTP user or password" });
  });

  it("resolves with the SMTP error instead of rejecting", async () => {
    sendMail.mockRejectedValueOnce(new Error("Invalid login"));

    const result = await createSmtpSender(SETTINGS).send(MESSAGE);
    expect(result).toEqual({ ok: false, error: "SMTP error: Invalid login" });
  });
});
