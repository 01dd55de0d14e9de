export {
  loadLabelDictionary,
  readLabelDictionary,
  type LabelDictionary,
  type LabelKind,
  type LabelRecord,
  type LoadedLabelDictionary,
} from "./dictionary.js";
export {
  classifyLabels,
  type CategoryPartition,
  type ResolvedLabel,
  type UnrecognizedLabel,
} from "./classify.js";
export {
  selectFolder,
  ALL_MAIL_TAG,
  UNLABELED_FOLDER,
  type FolderDecision,
  type FolderSource,
} from "./select.js";
