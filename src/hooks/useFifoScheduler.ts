'use client';

import { useState, useCallback, useRef, useEffect } from 'react';
import { CallbackSink, ConsoleSink, type LogEvent } from '@/lib/logging/logger';
import type { SchedulerConfigInput } from '@/lib/fifo/config';
import { SchedulerSession } from '@/lib/fifo/session';
import type { ProcessRecord, SchedulerDisplay } from '@/lib/fifo/types';

const MAX_LOG_ENTRIES = 50;

export interface FifoSchedulerOptions {
  config?: SchedulerConfigInput;
  /** Mirror log events to the browser console as well. */
  logToConsole?: boolean;
}

export function useFifoScheduler({ config, logToConsole = true }: FifoSchedulerOptions = {}) {
  const [queue, setQueue] = useState<readonly ProcessRecord[]>([]);
  const [onCpu, setOnCpu] = useState<ProcessRecord | null>(null);
  const [isRunning, setIsRunning] = useState(false);
  const [completed, setCompleted] = useState<ProcessRecord[]>([]);
  const [enqueuedTotal, setEnqueuedTotal] = useState(0);
  const [log, setLog] = useState<LogEvent[]>([]);
  const [speed, setSpeedState] = useState(config?.speed ?? 1);

  const sessionRef = useRef<SchedulerSession | null>(null);

  const getSession = useCallback((): SchedulerSession => {
    if (sessionRef.current) return sessionRef.current;

    const display: SchedulerDisplay = {
      onQueueChanged: (snapshot) => setQueue(snapshot),
      onExecutionStarted: (record) => setOnCpu(record),
      onExecutionEnded: (record, outcome) => {
        setOnCpu(null);
        if (outcome === "finished") setCompleted(prev => [...prev, record]);
      },
      onSimulationStarted: () => setIsRunning(true),
      onSimulationEnded: () => setIsRunning(false),
    };

    const sinks = [
      new CallbackSink(event => setLog(prev => [...prev, event].slice(-MAX_LOG_ENTRIES))),
      ...(logToConsole ? [new ConsoleSink()] : []),
    ];
    sessionRef.current = new SchedulerSession({ display, config, sinks });
    return sessionRef.current;
  }, [config, logToConsole]);

  // StrictMode mounts twice; the next command after a remount builds a fresh session
  useEffect(() => {
    return () => {
      sessionRef.current?.dispose();
      sessionRef.current = null;
    };
  }, []);

  const enqueue = useCallback(() => {
    const record = getSession().enqueue();
    setEnqueuedTotal(record.sequenceNumber);
    return record;
  }, [getSession]);

  const start = useCallback(() => getSession().start(), [getSession]);

  const cancel = useCallback(() => getSession().cancel(), [getSession]);

  const reset = useCallback(() => {
    getSession().reset();
    setCompleted([]);
    setLog([]);
  }, [getSession]);

  const setSpeed = useCallback((next: number) => {
    getSession().setSpeed(next);
    setSpeedState(next);
  }, [getSession]);

  return {
    queue,
    onCpu,
    isRunning,
    completed,
    enqueuedTotal,
    log,
    speed,
    enqueue,
    start,
    cancel,
    reset,
    setSpeed,
  };
}
