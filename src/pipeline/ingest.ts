import { PDFParse } from "pdf-parse";

export interface IngestResult {
  filename: string;
  page_count: number;
  total_characters: number;
  full_text: string;
}

function pipelineError(message: string, code: string, detail?: string): Error {
  return Object.assign(new Error(message), { code, detail });
}

/**
 * Read the text layer of an uploaded agreement. Plain text passes through as UTF-8.
 * Scanned PDFs with no text layer are rejected rather than OCR'd.
 */
export async function ingestDocument(file: File): Promise<IngestResult> {
  const buffer = new Uint8Array(await file.arrayBuffer());
  let fullText: string;
  let pageCount: number;

  if (file.type === "application/pdf") {
    try {
      const parser = new PDFParse({ data: buffer });
      try {
        const textResult = await parser.getText();
        fullText = textResult.text;
        pageCount = textResult.total;
      } finally {
        await parser.destroy();
      }
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw pipelineError(`PDF parse failed: ${message}`, "PARSE_ERROR", message);
    }
  } else {
    fullText = new TextDecoder().decode(buffer);
    pageCount = 1;
  }

  if (fullText.trim() === "") {
    throw pipelineError(
      `No extractable text in ${file.name}; scanned documents need a text layer`,
      "EMPTY_DOCUMENT",
    );
  }

  return {
    filename: file.name,
    page_count: pageCount,
    total_characters: fullText.length,
    full_text: fullText,
  };
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}
