export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export type LogEvent = {
  level: LogLevel;
  namespace: string;
  message: string;
  context?: LogContext;
  error?: Error;
  createdAt: string;
};

export interface LoggerSink {
  emit(event: LogEvent): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class InMemorySink implements LoggerSink {
  private readonly events: LogEvent[] = [];

  emit(event: LogEvent) {
    this.events.push(event);
  }

  read(): readonly LogEvent[] {
    return this.events;
  }
}

export class ConsoleSink implements LoggerSink {
  constructor(private readonly minLevel: LogLevel = "info") {}

  emit(event: LogEvent) {
    if (LEVEL_RANK[event.level] < LEVEL_RANK[this.minLevel]) return;

    const context = event.context ? ` ${JSON.stringify(event.context)}` : "";
    const line = `[${event.namespace}] ${event.level}: ${event.message}${context}`;

    // stdout may carry the report
    console.error(line);
    if (event.error) console.error(event.error);
  }
}

export class Logger {
  private sinks: LoggerSink[];

  constructor(
    readonly namespace: string = "scheduler",
    sinks: LoggerSink[] = []
  ) {
    this.sinks = sinks;
  }

  withSink(sink: LoggerSink): this {
    this.sinks = [...this.sinks, sink];
    return this;
  }

  child(namespace: string): Logger {
    return new Logger(`${this.namespace}:${namespace}`, this.sinks);
  }

  debug(message: string, context?: LogContext): void {
    this.emit("debug", message, context);
  }
  info(message: string, context?: LogContext): void {
    this.emit("info", message, context);
  }
  warn(message: string, context?: LogContext): void {
    this.emit("warn", message, context);
  }
  error(message: string, error?: Error, context?: LogContext): void {
    this.emit("error", message, context, error);
  }

  private emit(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error
  ): void {
    const event: LogEvent = {
      level,
      namespace: this.namespace,
      message,
      context,
      error,
      createdAt: new Date().toISOString(),
    };
    for (const sink of this.sinks) sink.emit(event);
  }
}
