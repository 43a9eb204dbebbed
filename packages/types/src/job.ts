export type JobType = "ingest" | "generate" | "recommend" | "maintenance";

export interface JobData {
  type: JobType;
}

export interface IngestJobData extends JobData {
  type: "ingest";
  documentId: string;
  ownerId: string;
  filename: string;
  mimeType: string;
  /** Raw file bytes, base64 encoded. */
  contentBase64: string;
  category?: string;
}

export interface GenerateJobData extends JobData {
  type: "generate";
  ownerId: string;
  topic: string;
  targetWordCount?: number;
}

export interface RecommendJobData extends JobData {
  type: "recommend";
  articleId: string;
}

export type MaintenanceJobData =
  | (JobData & { type: "maintenance"; action: "expire-passages"; retentionDays: number })
  | (JobData & { type: "maintenance"; action: "delete-passage"; passageId: string });

/** Both run on the generation queue, since both call the model. */
export type ModelJobData = GenerateJobData | RecommendJobData;

export type AnyJobData = IngestJobData | ModelJobData | MaintenanceJobData;
