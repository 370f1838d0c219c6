// Configuration types for the agent stream

export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

export interface MarkerPair {
  open: string;
  close: string;
}

export interface StreamConfig {
  /**
   * Overall deadline for a session, measured from start (ms)
   * @default 30000
   */
  deadlineMs: number;

  /**
   * How long the consumer waits for one event before checking liveness (ms)
   * @default 1000
   */
  waitTimeoutMs: number;

  /**
   * How long cleanup waits for the agent call to settle before abandoning it (ms)
   * @default 5000
   */
  joinTimeoutMs: number;

  /**
   * Queue size above which a warning is logged. Events are never dropped.
   * @default 1000
   */
  queueCapacity: number;

  /**
   * Characters buffered before deciding whether a stream opens a marker
   * @default 20
   */
  lookahead: number;

  /**
   * Delimiters around hidden reasoning text
   * @default { open: "<thinking>", close: "</thinking>" }
   */
  markers: MarkerPair;

  /**
   * Events kept by the debug handler
   * @default 100
   */
  maxDebugEvents: number;

  /**
   * Record every event in the debug handler
   * @default false
   */
  debug: boolean;
}

export type StreamOptions = Partial<Omit<StreamConfig, "markers">> & {
  markers?: Partial<MarkerPair>;
};
