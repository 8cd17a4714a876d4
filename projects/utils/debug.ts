/**
 * Debug output shared by every stage
 */
import fs from 'fs';

/**
 * Something that has a debug str
 */
export interface IHaveDebugStr {
  toDebugStr(): string;
}

export function log(...args: unknown[]) {
  logger.log(...args);
}

type Listener = (...args: unknown[]) => void;
class Logger {
  static readonly instance = new Logger();
  private listeners: Set<Listener> = new Set();
  private debugFile: number | undefined = undefined;

  private constructor() {}

  subscribe(listener: Listener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  log(...args: unknown[]) {
    for (const listener of this.listeners) {
      listener(...args);
    }
    const debugFilePath = process.env.DEBUG_FILE;
    if (process.env.DEBUG) {
      console.log(...args);
    } else if (debugFilePath) {
      if (this.debugFile === undefined) {
        this.debugFile = fs.openSync(debugFilePath, 'w');
      }
      fs.writeSync(this.debugFile, args.join(' ') + '\n');
    }
  }

  /**
   * Run insideFunc, appending every line logged while it runs to logs.
   */
  capture<R>(insideFunc: () => R, logs: string[]): R {
    const unsub = this.subscribe((...args) => logs.push(args.join(' ')));
    try {
      return insideFunc();
    } finally {
      unsub();
    }
  }
}
export const logger = Logger.instance;

let shouldUseColors = false;
export function useColors(enabled = true) {
  shouldUseColors = enabled;
}

const ColorCodes = {
  black: '\u001b[30m',
  red: '\u001b[31m',
  green: '\u001b[32m',
  yellow: '\u001b[33m',
  blue: '\u001b[34m',
  magenta: '\u001b[35m',
  cyan: '\u001b[36m',
  white: '\u001b[37m',
  reset: '\u001b[0m',
  bold: '\u001b[1m',
  underline: '\u001b[4m',
  reversed: '\u001b[7m',
};
type ColorName = keyof typeof ColorCodes;
type ColorFuncs = {
  [Property in ColorName]: (s: string) => string;
};

function colorFunc(color: ColorName) {
  return (s: string): string =>
    shouldUseColors ? ColorCodes[color] + s + ColorCodes.reset : s;
}

const colors: ColorFuncs = {
  black: colorFunc('black'),
  red: colorFunc('red'),
  green: colorFunc('green'),
  yellow: colorFunc('yellow'),
  blue: colorFunc('blue'),
  magenta: colorFunc('magenta'),
  cyan: colorFunc('cyan'),
  white: colorFunc('white'),
  reset: colorFunc('reset'),
  bold: colorFunc('bold'),
  underline: colorFunc('underline'),
  reversed: colorFunc('reversed'),
};
export { colors };
