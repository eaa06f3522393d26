/**
 * Typed observer for fire-after-commit notifications.
 *
 * @example
 * const completed = createSubject<{ sessionId: string; profit: number }>();
 * const unsubscribe = completed.subscribe(({ sessionId }) => refreshSummary(sessionId));
 * await completed.notify({ sessionId: 's1', profit: 200 });
 * unsubscribe();
 */

export type Observer<T> = (event: T) => void | Promise<void>;

export type Unsubscribe = () => void;

export type Subject<T> = {
  subscribe(observer: Observer<T>): Unsubscribe;
  /** Awaits every observer; a throwing observer goes to `onError` and never rejects `notify`. */
  notify(event: T): Promise<void>;
};

export type SubjectOptions<T> = {
  onError?: (error: unknown, event: T) => void;
};

export function createSubject<T>(options: SubjectOptions<T> = {}): Subject<T> {
  const observers = new Set<Observer<T>>();
  const onError = options.onError ?? ((error: unknown) => console.error('Observer error:', error));

  const invoke = async (observer: Observer<T>, event: T): Promise<void> => {
    await observer(event);
  };

  return {
    subscribe(observer) {
      observers.add(observer);
      return () => {
        observers.delete(observer);
      };
    },

    async notify(event) {
      const results = await Promise.allSettled(
        Array.from(observers).map((observer) => invoke(observer, event)),
      );

      for (const result of results) {
        if (result.status === 'rejected') {
          onError(result.reason, event);
        }
      }
    },
  };
}
