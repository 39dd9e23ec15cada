/**
 * One device as reported by `adb devices -l`, whether usable or not.
 */
export interface DeviceSummary {
  /** Stable device identifier (ADB serial). */
  device_id: string;
  /** Raw adb state: `device`, `unauthorized`, `offline`, `recovery`, ... */
  state: string;
  /** True only when `state` is `device` (authorized and online). */
  ready: boolean;
  /** Human-friendly model name when available; otherwise "<unknown>". */
  model: string;
  /** Transport type inferred from the ADB serial. */
  transport: "USB" | "TCP";
}
