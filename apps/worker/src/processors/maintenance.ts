import type { Logger } from "@groundwrite/logger";
import type { ISearchIndex } from "@groundwrite/search-index";
import type { MaintenanceJobData } from "@groundwrite/types";

export interface MaintenanceDependencies {
  searchIndex: ISearchIndex;
  logger?: Logger;
}

export interface MaintenanceResult {
  action: MaintenanceJobData["action"];
  removed: number;
}

export async function processMaintenance(
  data: MaintenanceJobData,
  deps: MaintenanceDependencies,
): Promise<MaintenanceResult> {
  switch (data.action) {
    case "expire-passages": {
      const removed = await deps.searchIndex.deleteOlderThan(data.retentionDays);
      deps.logger?.info({ retentionDays: data.retentionDays, removed }, "expired old passages");
      return { action: data.action, removed };
    }
    case "delete-passage": {
      const deleted = await deps.searchIndex.deletePassage(data.passageId);
      if (!deleted) {
        deps.logger?.warn({ passageId: data.passageId }, "passage to delete was not found");
      }
      return { action: data.action, removed: deleted ? 1 : 0 };
    }
  }
}
