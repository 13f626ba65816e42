/**
 * Tests for TraceContext - AsyncLocalStorage-based context for batch passes
 * and per-user cycles.
 */

import { describe, it, expect } from 'vitest';
import {
  withTraceContext,
  createTraceContext,
  createUserCycleContext,
  getTraceContext,
  type TraceContext,
} from '../../../src/core/trace-context.js';

describe('TraceContext', () => {
  describe('Context propagation', () => {
    it('propagates context through async boundaries', async () => {
      const ctx = createTraceContext('batch-1');
      let capturedContext: TraceContext | undefined;

      await withTraceContext(ctx, async () => {
        expect(getTraceContext()).toEqual(ctx);

        await Promise.all([
          Promise.resolve().then(() => {
            capturedContext = getTraceContext();
          }),
          new Promise((resolve) => setTimeout(resolve, 10)).then(() => {
            expect(getTraceContext()?.traceId).toBe('batch-1');
          }),
        ]);
      });

      expect(capturedContext).toEqual(ctx);
    });

    it('context is undefined outside withTraceContext', () => {
      expect(getTraceContext()).toBeUndefined();
    });

    it('nested contexts override and then restore the parent', async () => {
      await withTraceContext(createTraceContext('parent'), async () => {
        await withTraceContext(createTraceContext('child', { parentId: 'parent' }), async () => {
          expect(getTraceContext()?.traceId).toBe('child');
          expect(getTraceContext()?.parentId).toBe('parent');
        });

        expect(getTraceContext()?.traceId).toBe('parent');
      });
    });
  });

  describe('createTraceContext', () => {
    it('creates context with traceId and a root spanId', () => {
      const ctx = createTraceContext('test-id');

      expect(ctx.traceId).toBe('test-id');
      expect(ctx.spanId).toMatch(/^root_[a-z0-9-]{8}$/);
    });

    it('omits optional fields that were not given', () => {
      const ctx = createTraceContext('test-id', { spanId: 'batch' });

      expect(ctx).toEqual({ traceId: 'test-id', spanId: 'batch' });
    });

    it('creates context with all optional fields', () => {
      const ctx = createTraceContext('test-id', {
        correlationId: 'corr-123',
        parentId: 'parent-abc',
        spanId: 'span-1',
      });

      expect(ctx).toEqual({
        traceId: 'test-id',
        correlationId: 'corr-123',
        parentId: 'parent-abc',
        spanId: 'span-1',
      });
    });
  });

  describe('span ids', () => {
    it('generates a root span when none is given', () => {
      expect(createTraceContext('test-id').spanId).toMatch(/^root_[a-z0-9-]{8}$/);
    });

    it('generates unique spans', () => {
      const spans = new Set<string | undefined>();
      for (let i = 0; i < 100; i++) {
        spans.add(createTraceContext('test-id').spanId);
      }
      expect(spans.size).toBe(100);
    });
  });

  describe('createUserCycleContext', () => {
    it('starts a new root outside a batch', () => {
      const ctx = createUserCycleContext(42);

      expect(ctx.spanId).toBe('user_42');
      expect(ctx.correlationId).toBeUndefined();
      expect(ctx.parentId).toBeUndefined();
    });

    it('joins the batch trace inside one', () => {
      const batch = createTraceContext('batch-7', { spanId: 'batch' });

      const ctx = withTraceContext(batch, () => createUserCycleContext(3));

      expect(ctx).toEqual({
        traceId: 'batch-7',
        correlationId: 'batch-7',
        parentId: 'batch',
        spanId: 'user_3',
      });
    });

    it('keeps users of one batch apart under concurrency', async () => {
      const seen: string[] = [];

      await withTraceContext(createTraceContext('batch-9', { spanId: 'batch' }), () =>
        Promise.all(
          [1, 2, 3].map((id) =>
            withTraceContext(createUserCycleContext(id), async () => {
              await new Promise((resolve) => setTimeout(resolve, 4 - id));
              seen.push(`${getTraceContext()?.traceId ?? 'none'}/${getTraceContext()?.spanId ?? 'none'}`);
            })
          )
        )
      );

      expect(seen.sort()).toEqual(['batch-9/user_1', 'batch-9/user_2', 'batch-9/user_3']);
    });
  });
});
