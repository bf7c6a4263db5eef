export { resolveThresholds } from "./resolver.js";

export {
  ThresholdSettingsService,
  resolveThresholdsForUser,
  validateThresholdInput,
} from "./service.js";
export type { EffectiveThresholds, ThresholdServiceOptions } from "./service.js";

export { SqliteThresholdSettingsStore } from "./sqlite-settings-store.js";
export type { ThresholdSettingsStore } from "./store.js";
