import { beforeEach, describe, expect, it, vi } from "vitest";

const AGREEMENT_ID = "3f1c2b9e-8a4d-4c1e-9b2a-5d6e7f8a9b0c";
const UNKNOWN_ID = "00000000-0000-4000-8000-000000000000";

const ROW = {
  id: AGREEMENT_ID,
  source_filename: "acme.pdf",
  uploaded_at: new Date("2025-01-10T09:00:00Z"),
  restored_at: null,
  tenant_name: "Acme Traders",
  area_sqft: "3200",
  floor: "Ground Floor",
  building: "JP Classic",
  period_of_rent: "36",
  rent_amount: "72",
  maintenance: "13",
  rent_escalation: "5%",
  agreement_start_date: "2017-01-01",
  agreement_expiry_date: "2020-01-01",
  lock_in_period: "18",
  lock_in_period_end_date: "2018-07-01",
  rental_period_greater_than_lock_in_period: true,
  next_rent_escalation: "",
};

vi.mock("../../src/config.ts", () => ({ config: { maxUploadBytes: 1024 } }));

vi.mock("../../src/pipeline/orchestrator.ts", () => ({
  processAgreement: vi.fn(),
}));

vi.mock("../../src/db/pool.ts", () => ({
  getPool: vi.fn().mockReturnValue({}),
}));

vi.mock("../../src/db/agreements.ts", () => ({
  listAgreements: vi.fn(),
  findAgreementById: vi.fn(),
  archiveAgreement: vi.fn(),
}));

import {
  archiveAgreement,
  findAgreementById,
  listAgreements,
} from "../../src/db/agreements.ts";
import { processAgreement } from "../../src/pipeline/orchestrator.ts";

// Import AFTER mocks are set up
const { agreements } = await import("../../src/routes/agreements.ts");

function upload(file?: File): Request {
  const form = new FormData();
  if (file) form.append("file", file);
  return new Request("http://localhost/agreements", { method: "POST", body: form });
}

beforeEach(() => {
  vi.clearAllMocks();
  vi.mocked(listAgreements).mockResolvedValue([ROW]);
  vi.mocked(findAgreementById).mockResolvedValue(ROW);
  vi.mocked(archiveAgreement).mockResolvedValue(null);
  vi.mocked(processAgreement).mockResolvedValue({ ...ROW, alert_status: "expired" });
});

describe("POST /api/agreements", () => {
  it("returns 400 when no file is provided", async () => {
    const res = await agreements.fetch(upload());
    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: string };
    expect(body.error).toContain("file");
  });

  it("returns 400 when the body is not multipart", async () => {
    const res = await agreements.fetch(
      new Request("http://localhost/agreements", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ file: "lease.txt" }),
      }),
    );
    expect(res.status).toBe(400);
    expect(vi.mocked(processAgreement)).not.toHaveBeenCalled();
  });

  it("returns 415 for unsupported file types", async () => {
    const res = await agreements.fetch(upload(new File(["a,b"], "data.csv", { type: "text/csv" })));
    expect(res.status).toBe(415);
  });

  it("returns 413 when the upload exceeds the limit", async () => {
    const res = await agreements.fetch(
      upload(new File(["x".repeat(4096)], "big.txt", { type: "text/plain" })),
    );
    expect(res.status).toBe(413);
    expect(vi.mocked(processAgreement)).not.toHaveBeenCalled();
  });

  it("returns 201 with the stored agreement", async () => {
    const res = await agreements.fetch(
      upload(new File(["Licensee: Acme Traders"], "acme.txt", { type: "text/plain" })),
    );
    expect(res.status).toBe(201);
    const body = (await res.json()) as { agreement: { id: string; alert_status: string } };
    expect(body.agreement.id).toBe(AGREEMENT_ID);
    expect(body.agreement.alert_status).toBe("expired");
  });

  it("returns 422 for a document with no text", async () => {
    vi.mocked(processAgreement).mockRejectedValueOnce(
      Object.assign(new Error("No extractable text in blank.txt"), { code: "EMPTY_DOCUMENT" }),
    );

    const res = await agreements.fetch(upload(new File([" "], "blank.txt", { type: "text/plain" })));
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ error: "No extractable text in blank.txt" });
  });

  it("returns 500 when extraction fails", async () => {
    vi.mocked(processAgreement).mockRejectedValueOnce(new Error("LLM timeout"));

    const res = await agreements.fetch(upload(new File(["text"], "a.txt", { type: "text/plain" })));
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "agreement processing failed" });
  });
});

describe("GET /api/agreements", () => {
  it("returns every agreement with a computed alert tier", async () => {
    const res = await agreements.fetch(new Request("http://localhost/agreements"));
    expect(res.status).toBe(200);
    const body = (await res.json()) as { agreements: Array<{ id: string; alert_status: string }> };
    expect(body.agreements).toHaveLength(1);
    expect(body.agreements[0]?.alert_status).toBe("expired");
  });
});

describe("GET /api/agreements/export.csv", () => {
  it("downloads a CSV attachment rather than looking up an id", async () => {
    const res = await agreements.fetch(new Request("http://localhost/agreements/export.csv"));

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("text/csv; charset=utf-8");
    expect(res.headers.get("Content-Disposition")).toMatch(
      /^attachment; filename=tenant_agreements_\d{8}_\d{6}\.csv$/,
    );
    const lines = (await res.text()).split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[1]?.startsWith('"Acme Traders","3200 sqft"')).toBe(true);
    expect(vi.mocked(findAgreementById)).not.toHaveBeenCalled();
  });
});

describe("GET /api/agreements/:id", () => {
  it("returns the agreement when found", async () => {
    const res = await agreements.fetch(new Request(`http://localhost/agreements/${AGREEMENT_ID}`));
    expect(res.status).toBe(200);
    const body = (await res.json()) as { agreement: { id: string } };
    expect(body.agreement.id).toBe(AGREEMENT_ID);
  });

  it("returns 404 when the agreement does not exist", async () => {
    vi.mocked(findAgreementById).mockResolvedValueOnce(null);

    const res = await agreements.fetch(new Request(`http://localhost/agreements/${UNKNOWN_ID}`));
    expect(res.status).toBe(404);
  });

  it("returns 404 for an id that is not a UUID without querying", async () => {
    const res = await agreements.fetch(new Request("http://localhost/agreements/abc"));
    expect(res.status).toBe(404);
    expect(vi.mocked(findAgreementById)).not.toHaveBeenCalled();
  });
});

describe("DELETE /api/agreements/:id", () => {
  it("archives the agreement", async () => {
    vi.mocked(archiveAgreement).mockResolvedValueOnce({
      ...ROW,
      archived_at: new Date("2025-05-01T00:00:00Z"),
    });

    const res = await agreements.fetch(
      new Request(`http://localhost/agreements/${AGREEMENT_ID}`, { method: "DELETE" }),
    );
    expect(res.status).toBe(200);
    const body = (await res.json()) as { archived: { id: string; archived_at: string } };
    expect(body.archived.id).toBe(AGREEMENT_ID);
    expect(body.archived.archived_at).toBe("2025-05-01T00:00:00.000Z");
  });

  it("returns 404 for an unknown id", async () => {
    const res = await agreements.fetch(
      new Request(`http://localhost/agreements/${UNKNOWN_ID}`, { method: "DELETE" }),
    );
    expect(res.status).toBe(404);
  });

  it("returns 404 for an id that is not a UUID without querying", async () => {
    const res = await agreements.fetch(
      new Request("http://localhost/agreements/abc", { method: "DELETE" }),
    );
    expect(res.status).toBe(404);
    expect(vi.mocked(archiveAgreement)).not.toHaveBeenCalled();
  });
});
