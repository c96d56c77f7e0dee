import { useEffect, useState } from 'react';
import { useStore, type Atom } from 'jotai';

/**
 * Reads an atom at a fixed cadence instead of on every change.
 * Changes are noted as they happen and picked up on the next interval, so a
 * value written at the sampling rate re-renders at most once per interval.
 */
export function useThrottledAtomValue<Value>(anAtom: Atom<Value>, intervalMs: number): Value {
  const store = useStore();
  const [value, setValue] = useState(() => store.get(anAtom));

  useEffect(() => {
    let dirty = false;
    const unsubscribe = store.sub(anAtom, () => {
      dirty = true;
    });
    const timer = setInterval(() => {
      if (!dirty) return;
      dirty = false;
      setValue(() => store.get(anAtom));
    }, intervalMs);

    // The store or atom may have moved on before the subscription
    setValue(() => store.get(anAtom));

    return () => {
      unsubscribe();
      clearInterval(timer);
    };
  }, [store, anAtom, intervalMs]);

  return value;
}
