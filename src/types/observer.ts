import type {
  Observation,
  ObservationSeverity,
  SourceType,
} from "./observation.js";

export interface FileWatchTarget {
  type: "files";
  paths: string[];
}

export interface ConversationWatchTarget {
  type: "conversation";
  includeToolCalls: boolean;
  includeReasoning: boolean;
}

export type WatchTarget = FileWatchTarget | ConversationWatchTarget;

export interface ObserverConfig {
  name: string;
  description: string;
  focus: string;
  model: string;
  timeoutSeconds: number;
  watch: WatchTarget[];
  tools: string[];
  enabled: boolean;
}

export type OnTimeoutPolicy = "skip" | "fail";

export interface ExecutionConfig {
  mode: "parallel_sync";
  maxConcurrent: number;
  timeoutPerObserverSeconds: number;
  onTimeout: OnTimeoutPolicy;
}

export interface HookConfig {
  trigger: string;
  priority: number;
}

export interface ObserverReference {
  observer: string;
  watch: WatchTarget[];
  model?: string;
  timeout?: number;
  enabled: boolean;
}

export interface RetentionConfig {
  cycles: number;
}

export interface ObserversModuleConfig {
  hooks: HookConfig[];
  execution: ExecutionConfig;
  observers: ObserverReference[];
  retention: RetentionConfig;
}

export interface TranscriptMessage {
  role: "user" | "assistant" | "tool" | "system";
  content: string;
  reasoning?: string;
}

/** A finding as returned by an observer, before the store assigns identity. */
export interface ObservationDraft {
  content: string;
  severity: ObservationSeverity;
  sourceType?: SourceType;
  sourceRef?: string;
  category?: string;
  suggestion?: string;
  metadata?: Record<string, unknown>;
}

export interface ResolutionRef {
  id: string;
  reason?: string;
}

export interface ObserverPayload {
  observations: ObservationDraft[];
  resolved: ResolutionRef[];
}

export interface ReviewContent {
  files: string[];
  text: string;
}

export interface ObserverInvocation {
  observer: ObserverConfig;
  content: ReviewContent;
  openObservations: Observation[];
}

/** Module configuration with every observer reference loaded and merged. */
export interface ResolvedObserversConfig {
  hooks: HookConfig[];
  execution: ExecutionConfig;
  observers: ObserverConfig[];
  retention: RetentionConfig;
}
