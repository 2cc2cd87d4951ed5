export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEvent {
  id: number;
  level: LogLevel;
  namespace: string;
  message: string;
  context?: LogContext;
  error?: Error;
  createdAt: string;
}

export interface LoggerSink {
  emit(event: LogEvent): void;
}

export class InMemorySink implements LoggerSink {
  private events: LogEvent[] = [];

  emit(event: LogEvent) {
    this.events.push(event);
  }

  read(): readonly LogEvent[] {
    return this.events;
  }

  messages(): string[] {
    return this.events.map((e) => e.message);
  }

  clear() {
    this.events = [];
  }
}

export class ConsoleSink implements LoggerSink {
  emit(event: LogEvent) {
    const line = `[${event.namespace}] ${event.message}`;
    const args: unknown[] = event.context ? [line, event.context] : [line];
    if (event.error) args.push(event.error);

    switch (event.level) {
      case "debug":
        console.debug(...args);
        break;
      case "info":
        console.info(...args);
        break;
      case "warn":
        console.warn(...args);
        break;
      case "error":
        console.error(...args);
        break;
    }
  }
}

/** Forwards every event to a plain function, e.g. a React state setter. */
export class CallbackSink implements LoggerSink {
  constructor(private readonly callback: (event: LogEvent) => void) {}

  emit(event: LogEvent) {
    this.callback(event);
  }
}

let nextEventId = 1;

export class Logger {
  private readonly namespace: string;
  private readonly minLevel: LogLevel;
  private sinks: LoggerSink[];

  constructor(namespace = "system", sinks: LoggerSink[] = [new ConsoleSink()], minLevel: LogLevel = "debug") {
    this.namespace = namespace;
    this.sinks = sinks;
    this.minLevel = minLevel;
  }

  withSink(sink: LoggerSink): this {
    this.sinks = [...this.sinks, sink];
    return this;
  }

  child(namespace: string): Logger {
    return new Logger(`${this.namespace}:${namespace}`, this.sinks, this.minLevel);
  }

  debug(message: string, context?: LogContext): void { this.emit("debug", message, context); }
  info(message: string, context?: LogContext): void { this.emit("info", message, context); }
  warn(message: string, context?: LogContext): void { this.emit("warn", message, context); }
  error(message: string, error?: Error, context?: LogContext): void { this.emit("error", message, context, error); }

  private emit(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.minLevel)) return;
    const event: LogEvent = {
      id: nextEventId++,
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
