export type MessageLevel = "debug" | "info" | "warning";

export const MESSAGE_LEVELS: readonly MessageLevel[] = [
  "debug",
  "info",
  "warning",
];

const MESSAGE_TEMPLATES = {
  READING_SPRITE_IMAGE_DIRECTIVES: "Reading sprite image directives from %s",
  READING_SPRITE_REFERENCE_DIRECTIVES:
    "Reading sprite reference directives from %s",
  SPRITE_ID_NOT_FOUND: "'sprite' property is required",
  SPRITE_IMAGE_URL_NOT_FOUND: "'sprite-image' property is required",
  SPRITE_REF_NOT_FOUND: "'sprite-ref' property is required",
  REFERENCED_SPRITE_NOT_FOUND: "Referenced sprite: %s not found",
  UNSUPPORTED_PROPERTIES_FOUND: "Unsupported properties found: %s",
  UNSUPPORTED_VALUE: "Unsupported value for %s: %s",
  UNSUPPORTED_FORMAT: "Unsupported sprite image format: %s",
  INVALID_MARGIN: "Invalid margin value: %s",
  MALFORMED_COLOR: "Malformed color: %s",
  MALFORMED_URL: "Malformed URL: %s",
  UNSUPPORTED_ALIGNMENT_FOR_LAYOUT:
    "Alignment %s is not supported in %s sprites, using %s",
  NO_BACKGROUND_IMAGE_RULE_NEXT_TO_SPRITE_REFERENCE_DIRECTIVE:
    "No background-image rule next to sprite reference directive: %s",
  MORE_THAN_ONE_RULE_NEXT_TO_SPRITE_REFERENCE_DIRECTIVE:
    "More than one CSS rule next to sprite reference directive: %s",
  IGNORING_SPRITE_IMAGE_REDEFINITION: "Ignoring sprite image redefinition",
  CANNOT_READ_IMAGE: "Cannot read image %s: %s",
  SKIPPING_EMPTY_SPRITE: "Sprite %s has no readable images, skipping",
  PLACING_IMAGE: "Placing %s in sprite %s at offset %s",
  WRITING_SPRITE_IMAGE: "Writing %sx%s sprite image %s",
  WRITING_CSS: "Writing rewritten stylesheet %s",
} as const;

export type MessageType = keyof typeof MESSAGE_TEMPLATES;

export interface MessageLocation {
  cssPath?: string;
  line?: number;
}

export interface Message extends MessageLocation {
  level: MessageLevel;
  type: MessageType;
  args: string[];
}

export interface MessageSink {
  add: (message: Message) => void;
}

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

export const isLevelEnabled = (
  level: MessageLevel,
  minLevel: MessageLevel,
): boolean => MESSAGE_LEVELS.indexOf(level) >= MESSAGE_LEVELS.indexOf(minLevel);

export const formatMessageText = (message: Message): string => {
  let argIndex = 0;
  return MESSAGE_TEMPLATES[message.type].replace(/%s/g, () => {
    const value = message.args[argIndex];
    argIndex += 1;
    return value ?? "";
  });
};

/** Render a message as `path:line: text`, dropping the location parts it lacks. */
export const formatMessage = (message: Message): string => {
  const text = formatMessageText(message);
  if (message.cssPath === undefined) {
    return text;
  }

  const location =
    message.line === undefined
      ? message.cssPath
      : `${message.cssPath}:${message.line}`;
  return `${location}: ${text}`;
};

/**
 * Fans structured messages out to sinks. Expected per-line problems are
 * reported here rather than thrown.
 */
export class MessageLog {
  private readonly sinks: MessageSink[];

  constructor(...sinks: MessageSink[]) {
    this.sinks = sinks;
  }

  debug(type: MessageType, location: MessageLocation, ...args: string[]): void {
    this.log("debug", type, location, args);
  }

  info(type: MessageType, location: MessageLocation, ...args: string[]): void {
    this.log("info", type, location, args);
  }

  warning(
    type: MessageType,
    location: MessageLocation,
    ...args: string[]
  ): void {
    this.log("warning", type, location, args);
  }

  private log(
    level: MessageLevel,
    type: MessageType,
    location: MessageLocation,
    args: string[],
  ): void {
    const message: Message = { level, type, args, ...location };
    for (const sink of this.sinks) {
      sink.add(message);
    }
  }
}

export class MemoryMessageSink implements MessageSink {
  readonly messages: Message[] = [];

  add(message: Message): void {
    this.messages.push(message);
  }

  ofLevel(level: MessageLevel): Message[] {
    return this.messages.filter((message) => message.level === level);
  }

  count(level: MessageLevel): number {
    return this.ofLevel(level).length;
  }
}

const LEVEL_PREFIXES: Record<MessageLevel, string> = {
  debug: "🔎",
  info: "ℹ️",
  warning: "⚠️",
};

export const createConsoleSink = (minLevel: MessageLevel): MessageSink => ({
  add: (message) => {
    if (!isLevelEnabled(message.level, minLevel)) {
      return;
    }

    const line = `${LEVEL_PREFIXES[message.level]} ${formatMessage(message)}`;
    if (message.level === "warning") {
      console.warn(line);
      return;
    }
    console.log(line);
  },
});
