import { ingestDocument, type IngestionDependencies } from "@groundwrite/core";
import { AppError, ExtractionFailureError, ValidationError } from "@groundwrite/errors";
import type { ParserRegistry } from "@groundwrite/parser";
import type { IngestJobData, IngestionResult, ParseResult } from "@groundwrite/types";

export interface IngestProcessorDependencies extends IngestionDependencies {
  parsers: Pick<ParserRegistry, "getParser">;
}

/**
 * Ingest job processor.
 *
 * Workflow:
 * 1. Pick a parser for the upload's MIME type
 * 2. Extract text from the base64 payload
 * 3. Run the ingestion pipeline (chunk -> embed -> index)
 */
export async function processIngest(
  data: IngestJobData,
  deps: IngestProcessorDependencies,
): Promise<IngestionResult> {
  const parser = deps.parsers.getParser(data.mimeType);
  if (!parser) {
    throw new ValidationError(`Unsupported file type: ${data.mimeType}`, {
      mimeType: "unsupported",
    });
  }

  let parsed: ParseResult;
  try {
    parsed = await parser.parse(Buffer.from(data.contentBase64, "base64"), data.mimeType);
  } catch (err: unknown) {
    if (AppError.isAppError(err)) throw err;
    throw new ExtractionFailureError(data.documentId, `Could not extract text from ${data.filename}`, {
      cause: err,
    });
  }

  return ingestDocument(
    {
      documentId: data.documentId,
      ownerId: data.ownerId,
      filename: data.filename,
      contentType: data.mimeType,
      text: parsed.text,
      ...(data.category !== undefined ? { category: data.category } : {}),
    },
    deps,
  );
}
