type Context = Record<string, unknown>;

function line(tag: string, message: string): string {
  return `[${tag}] ${message}`;
}

/** Tagged console logger; one per module. */
export function createLogger(tag: string) {
  return {
    info(message: string, context?: Context) {
      if (context) console.info(line(tag, message), context);
      else console.info(line(tag, message));
    },
    warn(message: string, context?: Context) {
      if (context) console.warn(line(tag, message), context);
      else console.warn(line(tag, message));
    },
  };
}
