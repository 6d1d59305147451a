/**
 * Context Tests
 */

import * as shared from '@ledgerlens/shared';
import { getContext, getCorrelationId, runInChildContext, runWithContextAsync } from '@ledgerlens/shared';

describe('request context', () => {
  it('is undefined outside any context', () => {
    expect(getContext()).toBeUndefined();
  });

  it('exposes the correlation id of the current context', async () => {
    const id = await runWithContextAsync({ correlationId: 'run-1' }, async () => getCorrelationId());
    expect(id).toBe('run-1');
  });

  it('child contexts inherit the run id and get their own correlation id', async () => {
    const child = await runWithContextAsync({ correlationId: 'run-1', runId: 'run-1' }, () =>
      runInChildContext({ documentId: 'EXMP', strategy: 'refined' }, async () => getContext())
    );

    expect(child?.runId).toBe('run-1');
    expect(child?.documentId).toBe('EXMP');
    expect(child?.strategy).toBe('refined');
    expect(child?.correlationId).not.toBe('run-1');
    expect(child?.correlationId).toHaveLength(26);
  });

  it('child contexts keep a correlation id that is given', async () => {
    const child = await runInChildContext({ correlationId: 'job-7', jobId: '7' }, async () => getContext());
    expect(child).toEqual({ correlationId: 'job-7', jobId: '7' });
  });

  it('offers async runners only', () => {
    const runners = Object.keys(shared).filter((name) => /^run(With|In)/.test(name));
    expect(runners.sort()).toEqual(['runInChildContext', 'runWithContextAsync']);
  });
});
