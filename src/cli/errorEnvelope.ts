type ErrorContext = Partial<{
  source: string;
  index: number;
}>;

export type CliErrorEnvelope = {
  event: string;
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  status?: number;
  stack?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  if (typeof value.source === "string") sanitizedContext.source = value.source;
  if (typeof value.index === "number" && Number.isFinite(value.index)) sanitizedContext.index = value.index;

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (event: string, err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event,
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};
