import { Client } from "@opensearch-project/opensearch";
import type { OpenSearchConfig } from "@groundwrite/types";
import { OpenSearchIndex } from "./opensearch-index.js";

export function createSearchIndex(config: OpenSearchConfig): OpenSearchIndex {
  const client = new Client({
    node: config.url,
    ...(config.username !== undefined
      ? { auth: { username: config.username, password: config.password ?? "" } }
      : {}),
    ssl: { rejectUnauthorized: config.rejectUnauthorized },
  });

  return new OpenSearchIndex({
    transport: client.transport,
    index: config.index,
    close: () => client.close(),
  });
}
