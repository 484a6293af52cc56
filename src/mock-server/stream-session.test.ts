/**
 * Unit tests for StreamSession
 *
 * Covers the emission loop against a recording sink:
 * - ordering, timestamps and pacing
 * - client cancellation and server shutdown
 * - sink failures and timer cleanup
 */

import { describe, it, expect } from '@jest/globals';
import { status } from '@grpc/grpc-js';
import { StreamSession } from './stream-session';
import { RecordingSink, TrackingScheduler } from './test-helpers';
import { OperationKind } from './types/stream-types';
import type { EventSink, PhaseScript } from './types/stream-types';
import { createServiceRegistrationScript } from './scripts/service-registration-script';
import { createModuleRegistrationScript } from './scripts/module-registration-script';
import { scriptDurationMs } from './scripts/script-builder';
import { SessionAlreadyStartedError } from './errors';
import { EventType } from '../shared/types/registration-types';

function createSession(script: PhaseScript, sink: EventSink, extra: {
  shutdownSignal?: AbortSignal;
  scheduler?: TrackingScheduler;
} = {}): StreamSession {
  return new StreamSession({
    kind: OperationKind.SERVICE_REGISTRATION,
    subject: 'repository-service',
    script,
    sink,
    ...extra,
  });
}

describe('StreamSession', () => {
  describe('completion', () => {
    it('should emit every phase in order and end the sink', async () => {
      const sink = new RecordingSink();
      const session = createSession(createServiceRegistrationScript({ delayMs: 1 }), sink);

      const outcome = await session.run();

      expect(outcome).toBe('completed');
      expect(sink.events.map(e => e.phase)).toEqual([
        EventType.STARTED,
        EventType.VALIDATED,
        EventType.CONSUL_REGISTERED,
        EventType.HEALTH_CHECK_CONFIGURED,
        EventType.CONSUL_HEALTHY,
        EventType.COMPLETED,
      ]);
      expect(sink.events[1].message).toBe('Service registration request validated');
      expect(sink.ended).toBe(true);
      expect(sink.failure).toBeNull();
    });

    it('should stamp events with non-decreasing times', async () => {
      const sink = new RecordingSink();
      await createSession(createModuleRegistrationScript({ delayMs: 1 }), sink).run();

      const times = sink.events.map(e => e.emittedAt.getTime());
      expect(times).toHaveLength(10);
      for (let i = 1; i < times.length; i++) {
        expect(times[i]).toBeGreaterThanOrEqual(times[i - 1]);
      }
    });

    it('should pace phases by the script delays', async () => {
      const script = createServiceRegistrationScript();
      const sink = new RecordingSink();
      const started = Date.now();

      await createSession(script, sink).run();

      // Timer granularity allows a few ms of slack
      const elapsed = Date.now() - started;
      expect(elapsed).toBeGreaterThanOrEqual(scriptDurationMs(script) - 5);
      expect(elapsed).toBeLessThan(scriptDurationMs(script) + 150);
    });

    it('should not sleep after the last phase', async () => {
      const scheduler = new TrackingScheduler();
      await createSession(createServiceRegistrationScript({ delayMs: 1 }), new RecordingSink(), {
        scheduler,
      }).run();

      expect(scheduler.started).toBe(5);
      expect(scheduler.pending).toBe(0);
    });

    it('should publish a summary only once finished', async () => {
      const session = createSession(createServiceRegistrationScript({ delayMs: 1 }), new RecordingSink());
      expect(session.getSummary()).toBeNull();

      const run = session.run();
      expect(session.getSummary()).toBeNull();
      await run;

      const summary = session.getSummary();
      expect(summary).toMatchObject({
        sessionId: session.id,
        kind: OperationKind.SERVICE_REGISTRATION,
        subject: 'repository-service',
        outcome: 'completed',
        eventsEmitted: 6,
      });
      expect(summary?.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should refuse to run twice', async () => {
      const session = createSession(createServiceRegistrationScript({ delayMs: 1 }), new RecordingSink());
      const first = session.run();

      await expect(session.run()).rejects.toThrow(SessionAlreadyStartedError);
      await expect(first).resolves.toBe('completed');
    });
  });

  describe('client cancellation', () => {
    it('should stop after the events already sent without reporting to the sink', async () => {
      let session: StreamSession | null = null;
      const sink = new RecordingSink((_event, count) => {
        if (count === 2) session?.cancel();
      });
      session = createSession(createServiceRegistrationScript({ delayMs: 50 }), sink);

      const outcome = await session.run();

      expect(outcome).toBe('cancelled');
      expect(sink.events.map(e => e.phase)).toEqual([EventType.STARTED, EventType.VALIDATED]);
      expect(sink.ended).toBe(false);
      expect(sink.failure).toBeNull();
      expect(session.getEventsEmitted()).toBe(2);
    });

    it('should cancel during a long pause without waiting it out', async () => {
      const sink = new RecordingSink();
      const session = createSession(createServiceRegistrationScript({ delayMs: 60_000 }), sink);
      const started = Date.now();

      const run = session.run();
      session.cancel();

      await expect(run).resolves.toBe('cancelled');
      expect(Date.now() - started).toBeLessThan(1000);
      expect(sink.events).toHaveLength(1);
    });

    it('should release every pending timer across many cancelled sessions', async () => {
      const scheduler = new TrackingScheduler();
      const sessions = Array.from({ length: 50 }, () =>
        createSession(createModuleRegistrationScript({ delayMs: 10_000 }), new RecordingSink(), {
          scheduler,
        })
      );

      const runs = sessions.map(session => session.run());
      expect(scheduler.pending).toBe(50);

      sessions.forEach(session => session.cancel());
      const outcomes = await Promise.all(runs);

      expect(outcomes.every(outcome => outcome === 'cancelled')).toBe(true);
      expect(scheduler.pending).toBe(0);
    });

    it('should ignore cancel after completion', async () => {
      const session = createSession(createServiceRegistrationScript({ delayMs: 1 }), new RecordingSink());
      await session.run();

      session.cancel();

      expect(session.getOutcome()).toBe('completed');
    });
  });

  describe('server shutdown', () => {
    it('should fail the sink with INTERNAL after a partial sequence', async () => {
      const shutdown = new AbortController();
      const sink = new RecordingSink((_event, count) => {
        if (count === 3) shutdown.abort();
      });
      const session = createSession(createServiceRegistrationScript({ delayMs: 50 }), sink, {
        shutdownSignal: shutdown.signal,
      });

      const outcome = await session.run();

      expect(outcome).toBe('interrupted');
      expect(sink.events).toHaveLength(3);
      expect(sink.ended).toBe(false);
      expect(sink.failure?.code).toBe(status.INTERNAL);
      expect(sink.failure?.details).toBe('Registration stream interrupted: server shutting down');
    });

    it('should emit nothing when the server is already shutting down', async () => {
      const shutdown = new AbortController();
      shutdown.abort();
      const sink = new RecordingSink();

      const outcome = await createSession(createServiceRegistrationScript(), sink, {
        shutdownSignal: shutdown.signal,
      }).run();

      expect(outcome).toBe('interrupted');
      expect(sink.events).toHaveLength(0);
      expect(sink.failure?.code).toBe(status.INTERNAL);
    });
  });

  describe('sink errors', () => {
    it('should terminate with INTERNAL when a write throws', async () => {
      const sink = new RecordingSink((_event, count) => {
        if (count === 2) throw new Error('transport closed');
      });
      const session = createSession(createServiceRegistrationScript({ delayMs: 1 }), sink);

      const outcome = await session.run();

      expect(outcome).toBe('failed');
      expect(sink.failure?.code).toBe(status.INTERNAL);
      expect(sink.failure?.details).toBe('Registration stream failed: transport closed');
      expect(session.getEventsEmitted()).toBe(1);
    });

    it('should still finish when reporting the failure throws too', async () => {
      const sink: EventSink = {
        write: () => {
          throw new Error('transport closed');
        },
        end: () => undefined,
        fail: () => {
          throw new Error('stream destroyed');
        },
      };

      await expect(createSession(createServiceRegistrationScript(), sink).run()).resolves.toBe('failed');
    });
  });
});
