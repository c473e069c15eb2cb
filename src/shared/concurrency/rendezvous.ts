export type Received<T> = { done: false; value: T } | { done: true };

export type Rendezvous<T> = {
  send(value: T): Promise<void>;
  receive(shutdown: AbortSignal): Promise<Received<T>>;
};

type PendingSend<T> = {
  value: T;
  accept: () => void;
};

/**
 * Unbuffered hand-off between one producer and one consumer (no external deps).
 * `send` settles only once a receiver has taken the value; `receive` waits for the next
 * value, or reports `done` when `shutdown` is aborted and nothing is left to hand over.
 *
 * Usage:
 *   const channel = createRendezvous<string>();
 *   for (;;) { const next = await channel.receive(signal); if (next.done) break; ... }
 */
export const createRendezvous = <T>(): Rendezvous<T> => {
  const senders: PendingSend<T>[] = [];
  const receivers: Array<(received: Received<T>) => void> = [];

  const send = (value: T): Promise<void> =>
    new Promise<void>((resolve) => {
      const receiver = receivers.shift();
      if (receiver) {
        receiver({ done: false, value });
        resolve();
        return;
      }
      senders.push({ value, accept: resolve });
    });

  const receive = (shutdown: AbortSignal): Promise<Received<T>> =>
    new Promise<Received<T>>((resolve) => {
      // Values offered before shutdown are still delivered.
      const sender = senders.shift();
      if (sender) {
        sender.accept();
        resolve({ done: false, value: sender.value });
        return;
      }
      if (shutdown.aborted) {
        resolve({ done: true });
        return;
      }

      const onAbort = () => {
        const index = receivers.indexOf(receiver);
        if (index !== -1) receivers.splice(index, 1);
        resolve({ done: true });
      };
      const receiver = (received: Received<T>) => {
        shutdown.removeEventListener("abort", onAbort);
        resolve(received);
      };

      receivers.push(receiver);
      shutdown.addEventListener("abort", onAbort, { once: true });
    });

  return { send, receive };
};
