export class MindError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ConfigError extends MindError {}
export class StorageError extends MindError {}
export class StateCorruptionError extends MindError {}
export class MalformedTriggerError extends MindError {}
export class PlatformIOError extends MindError {}
export class PromotionError extends MindError {}
