export type InterruptHandler = (signal: NodeJS.Signals) => void;

/** Something that tells the pipeline the user wants it to stop. */
export interface InterruptSource {
  /** Register a handler; returns a function that removes it. */
  subscribe(handler: InterruptHandler): () => void;
}

const DEFAULT_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/** OS termination signals delivered to this process. */
export class ProcessInterruptSource implements InterruptSource {
  constructor(private signals: readonly NodeJS.Signals[] = DEFAULT_SIGNALS) {}

  subscribe(handler: InterruptHandler): () => void {
    const listener = (signal: NodeJS.Signals) => handler(signal);
    for (const signal of this.signals) process.on(signal, listener);
    return () => {
      for (const signal of this.signals) process.off(signal, listener);
    };
  }
}
