import { task, logger } from "@trigger.dev/sdk/v3";
import { organizeExport } from "../orchestration/organize.js";
import { OrganizeError } from "../types/errors.js";

export type OrganizeExportPayload = {
  /** Falls back to ORGANIZER_EXPORT_DIR. */
  exportDir?: string;
  outputDir?: string;
  dryRun?: boolean;
};

export type OrganizeExportOutput =
  | {
      ok: true;
      outputDir: string;
      processed: number;
      errors: number;
      warnings: number;
      folders: Array<{ name: string; count: number }>;
    }
  | { ok: false; error: string };

/**
 * Sorts a mounted Proton Mail export into one folder per email.
 * Run-level problems (no labels.json, output dir already present) return
 * ok: false; per-email problems are logged and counted in `errors`.
 */
export const organizeExportTask = task({
  id: "organize-export",
  machine: "small-1x",
  run: async (payload: OrganizeExportPayload): Promise<OrganizeExportOutput> => {
    const exportDir = payload.exportDir ?? process.env.ORGANIZER_EXPORT_DIR;
    if (!exportDir) {
      throw new Error("Missing export dir: pass exportDir or set ORGANIZER_EXPORT_DIR");
    }
    logger.info("organize-export started", { exportDir, dryRun: payload.dryRun ?? false });

    try {
      const result = organizeExport(
        { exportDir, outputDir: payload.outputDir, dryRun: payload.dryRun },
        logger
      );
      return {
        ok: true,
        outputDir: result.outputDir,
        processed: result.processed,
        errors: result.errors,
        warnings: result.warnings.length,
        folders: result.folders,
      };
    } catch (err) {
      if (err instanceof OrganizeError) {
        logger.error("organize-export failed", { error: err.message });
        return { ok: false, error: err.message };
      }
      throw err;
    }
  },
});
