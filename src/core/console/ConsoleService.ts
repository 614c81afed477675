export type ConsoleLevel = 'debug' | 'info' | 'warning' | 'error';

export interface ConsoleEntry {
  id: number;
  timestamp: number;
  level: ConsoleLevel;
  source: string;
  content: string;
}

type ConsoleListener = (entries: ConsoleEntry[]) => void;

const LEVEL_ORDER: Record<ConsoleLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
};

const MAX_ENTRIES = 500;
const TRIMMED_ENTRIES = 400;

class SectionConsoleImpl {
  private entries: ConsoleEntry[] = [];
  private listeners = new Set<ConsoleListener>();
  private nextId = 1;
  private minLevel: ConsoleLevel = 'info';

  /** Copy of the current entries */
  getEntries(): ConsoleEntry[] {
    return [...this.entries];
  }

  getLevel(): ConsoleLevel {
    return this.minLevel;
  }

  /** Entries below this level are dropped */
  setLevel(level: ConsoleLevel) {
    this.minLevel = level;
  }

  subscribe(listener: ConsoleListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notify() {
    const snapshot = [...this.entries];
    const failed: string[] = [];
    this.listeners.forEach(fn => {
      try {
        fn(snapshot);
      } catch (err) {
        this.listeners.delete(fn);
        failed.push(err instanceof Error ? err.message : String(err));
      }
    });
    for (const message of failed) {
      this.push({ level: 'error', source: 'console', content: `listener removed: ${message}` });
    }
  }

  private push(entry: Omit<ConsoleEntry, 'id' | 'timestamp'>) {
    this.entries.push(Object.freeze({
      ...entry,
      id: this.nextId++,
      timestamp: Date.now(),
    }));
    if (this.entries.length > MAX_ENTRIES) {
      this.entries = this.entries.slice(-TRIMMED_ENTRIES);
    }
  }

  log(level: ConsoleLevel, source: string, content: string) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    this.push({ level, source, content });
    this.notify();
  }

  debug(source: string, content: string) {
    this.log('debug', source, content);
  }

  info(source: string, content: string) {
    this.log('info', source, content);
  }

  warn(source: string, content: string) {
    this.log('warning', source, content);
  }

  error(source: string, content: string) {
    this.log('error', source, content);
  }

  clear() {
    this.entries = [];
    this.nextId = 1;
    this.notify();
  }
}

export const SectionConsole = new SectionConsoleImpl();

/** Compact number formatting for log lines */
export function formatValue(n: number): string {
  if (!Number.isFinite(n)) return String(n);
  const abs = Math.abs(n);
  if (abs !== 0 && (abs >= 1e6 || abs < 1e-3)) return n.toExponential(4);
  return Number(n.toFixed(4)).toString();
}
