import type { CategoryPartition, UnrecognizedLabel } from "./classify.js";

export const UNLABELED_FOLDER = "Unlabeled";

/** Tag every exported message carries; falling back to it is expected, not unusual. */
export const ALL_MAIL_TAG = "All Mail";

export type FolderSource =
  | "user_folder"
  | "system_folder"
  | "tag"
  | "unrecognized"
  | "unlabeled";

export interface FolderDecision {
  folderName: string;
  /** Which category the name came from. */
  source: FolderSource;
  /** How many labels competed in that category (0 for unlabeled). */
  candidates: number;
  /** Set when the email had only tags and the chosen one is not All Mail. */
  warning?: string;
}

/** Strict code-unit order, so the pick does not depend on locale or input order. */
function lexicalFirst(names: string[]): string {
  return names.reduce((min, name) => (name < min ? name : min));
}

export function unresolvedMarker(label: UnrecognizedLabel): string {
  return label.reason === "missing"
    ? `Unknown_Label_${label.id}`
    : `${label.name}_type${label.kindCode}`;
}

/**
 * Choose exactly one destination folder for an email.
 * Priority: user folders > system folders > tags > unrecognized labels > "Unlabeled".
 * Within a category the lexically smallest name wins. Never throws.
 */
export function selectFolder(
  partition: CategoryPartition,
  unlabeledFolder: string = UNLABELED_FOLDER
): FolderDecision {
  if (partition.userFolders.length > 0) {
    const names = partition.userFolders.map((l) => l.name);
    return { folderName: lexicalFirst(names), source: "user_folder", candidates: names.length };
  }

  if (partition.systemFolders.length > 0) {
    const names = partition.systemFolders.map((l) => l.name);
    return { folderName: lexicalFirst(names), source: "system_folder", candidates: names.length };
  }

  const tags = [...partition.userTags, ...partition.systemTags].map((l) => l.name);
  if (tags.length > 0) {
    const chosen = lexicalFirst(tags);
    const decision: FolderDecision = { folderName: chosen, source: "tag", candidates: tags.length };
    if (chosen !== ALL_MAIL_TAG) {
      decision.warning = `labels were tags, not folders: falling back to tag '${chosen}' (all tags: ${[...tags].sort().join(", ")})`;
    }
    return decision;
  }

  if (partition.unrecognized.length > 0) {
    const markers = partition.unrecognized.map(unresolvedMarker);
    return { folderName: lexicalFirst(markers), source: "unrecognized", candidates: markers.length };
  }

  return { folderName: unlabeledFolder, source: "unlabeled", candidates: 0 };
}
