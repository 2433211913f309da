// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import { useCallback, useEffect, useRef, useState } from 'react';

export type RequestState<T> =
  | { status: 'idle' }
  | { status: 'pending'; data?: T }
  | { status: 'success'; data: T }
  | { status: 'error'; error: unknown };

export type RequestEvent<T> =
  | { type: 'start' }
  | { type: 'resolve'; data: T }
  | { type: 'reject'; error: unknown }
  | { type: 'reset' };

/**
 * idle -> pending -> success | error; any state may restart or reset.
 * A pending retry keeps the previous data so views can keep showing it.
 */
export const requestReducer = <T,>(state: RequestState<T>, event: RequestEvent<T>): RequestState<T> => {
  switch (event.type) {
    case 'start':
      return state.status === 'success' ? { status: 'pending', data: state.data } : { status: 'pending' };
    case 'resolve':
      return state.status === 'pending' ? { status: 'success', data: event.data } : state;
    case 'reject':
      return state.status === 'pending' ? { status: 'error', error: event.error } : state;
    case 'reset':
      return { status: 'idle' };
  }
};

/**
 * Runs one async call at a time through `requestReducer`.
 * Results of a superseded or unmounted run are dropped.
 */
export const useRequest = <T, A extends unknown[]>(fn: (...args: A) => Promise<T>, label: string) => {
  const [state, setState] = useState<RequestState<T>>({ status: 'idle' });
  const runIdRef = useRef(0);
  const isMountedRef = useRef(true);

  const fnRef = useRef(fn);
  fnRef.current = fn;

  useEffect(() => {
    isMountedRef.current = true;
    return () => {
      isMountedRef.current = false;
    };
  }, []);

  const dispatch = useCallback((event: RequestEvent<T>) => {
    setState(prev => requestReducer(prev, event));
  }, []);

  const run = useCallback((...args: A): void => {
    const runId = ++runIdRef.current;
    const isCurrent = () => isMountedRef.current && runId === runIdRef.current;
    dispatch({ type: 'start' });
    fnRef.current(...args).then(
      data => {
        if (isCurrent()) dispatch({ type: 'resolve', data });
      },
      (error: unknown) => {
        console.error(`${label} failed:`, error);
        if (isCurrent()) dispatch({ type: 'reject', error });
      }
    );
  }, [dispatch, label]);

  const reset = useCallback(() => {
    runIdRef.current += 1;
    dispatch({ type: 'reset' });
  }, [dispatch]);

  return { state, run, reset };
};

export default useRequest;
