export {
  organizeExport,
  type OrganizeOptions,
  type OrganizeResult,
  type EmailOutcome,
  type EmailFailure,
  type EmailWarning,
  type FolderCount,
} from "./organize.js";
