/**
 * Shared timeout helper for promises.
 * `onTimeout` builds the rejection; it runs only when the deadline passes.
 */
export function withTimeout<T>(p: Promise<T>, ms: number, onTimeout: () => Error = () => new Error('timeout')): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const t = setTimeout(() => reject(onTimeout()), ms);
    p.then(
      (v) => { clearTimeout(t); resolve(v); },
      (e) => { clearTimeout(t); reject(e); },
    );
  });
}
