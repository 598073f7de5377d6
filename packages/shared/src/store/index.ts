export {
  DEFAULT_KEEP_DAYS,
  JsonStore,
  monthKey,
  type SaveResult,
} from "./json-store.js";
