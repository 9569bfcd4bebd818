export interface ConfigManager {
  /** Looks up a dot-path such as `orchestrator.deadlineMs`. Quoted segments may contain dots. */
  get(key: string): unknown;
  has(key: string): boolean;
  getAll(): Record<string, unknown>;
}
