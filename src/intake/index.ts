export { descriptorFromEmail } from "./descriptor.js";
export {
  IntakeWatcher,
  QUEUED_KEYWORD,
  type IntakeConfig,
  type IntakeLifecycle,
  type IntakeMailClient,
  type IntakeSummary,
} from "./watcher.js";
