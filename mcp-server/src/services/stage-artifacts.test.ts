import { describe, it, expect, vi } from 'vitest';
import { StageRecorder, completeStageArtifact, createStageArtifact, failStageArtifact } from './stage-artifacts.js';

describe('stage artifacts', () => {
  it('records completion timing', () => {
    const running = createStageArtifact(1, 'configure');
    const completed = completeStageArtifact(running, 'done', { count: 2 });

    expect(running.status).toBe('running');
    expect(completed).toMatchObject({ stage: 1, name: 'configure', status: 'completed', summary: 'done', details: { count: 2 } });
    expect(completed.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('records failures', () => {
    expect(failStageArtifact(createStageArtifact(2, 'match'), 'boom')).toMatchObject({
      status: 'failed',
      summary: 'Failed: boom',
      error: 'boom',
    });
  });
});

describe('StageRecorder', () => {
  it('numbers stages and replaces running entries', async () => {
    const onStageComplete = vi.fn();
    const recorder = new StageRecorder(onStageComplete);

    const value = await recorder.run('first', () => 21, (n) => ({ summary: `got ${n}` }));
    await recorder.run('second', async () => 'ok', () => ({ summary: 'second done' }));

    expect(value).toBe(21);
    expect(recorder.list().map((a) => [a.stage, a.name, a.status, a.summary])).toEqual([
      [1, 'first', 'completed', 'got 21'],
      [2, 'second', 'completed', 'second done'],
    ]);
    expect(onStageComplete).toHaveBeenCalledTimes(4);
  });

  it('marks a throwing stage failed and rethrows', async () => {
    const recorder = new StageRecorder();

    await expect(
      recorder.run(
        'explode',
        () => {
          throw new Error('nope');
        },
        () => ({ summary: 'unreachable' })
      )
    ).rejects.toThrow('nope');
    expect(recorder.list()).toMatchObject([{ name: 'explode', status: 'failed', error: 'nope' }]);
  });
});
