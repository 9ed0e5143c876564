import { describe, it, expect } from 'vitest';
import {
  BatchOptimizer,
  FINAL_SUMMARY_TITLE,
  renderBatch,
  totalTokens,
} from '../../src/services/summarization/batch-optimizer.js';
import { SummarizationDriver } from '../../src/services/summarization/summarization-driver.js';
import { titleTopic } from '../../src/services/summarization/topic-similarity.js';
import type { SummaryUnit } from '../../src/services/summarization/types.js';
import type { TextSummarizer } from '../../src/services/summarization/summarizer/types.js';
import { PipelineAbortedError } from '../../src/core/errors.js';
import { createStageSummarizer } from '../fixtures/summarizers.js';
import { WordTokenizer, words } from '../fixtures/word-tokenizer.js';

const tokenizer = new WordTokenizer();

function unit(id: string, title: string, tokenCount: number, order = 0): SummaryUnit {
  return { id, title, content: 'x', outputKey: id, order, tokenCount };
}

/** Five units totalling 200 tokens, all on one topic */
function apiUnits(): SummaryUnit[] {
  return [
    unit('a', 'Api a', 60, 0),
    unit('b', 'Api b', 50, 1),
    unit('c', 'Api c', 40, 2),
    unit('d', 'Api d', 30, 3),
    unit('e', 'Api e', 20, 4),
  ];
}

function optimizerFor(summarizer: TextSummarizer, maxStages = 3): BatchOptimizer {
  const driver = new SummarizationDriver(summarizer, tokenizer);
  return new BatchOptimizer(driver, { targetTokens: 160, maxStages });
}

describe('titleTopic', () => {
  it('should take the lower-cased first word', () => {
    expect(titleTopic('  Install Guide Part 1')).toBe('install');
    expect(titleTopic('')).toBe('');
  });
});

describe('renderBatch', () => {
  it('should join titled units with the batch separator', () => {
    expect(renderBatch([unit('a', 'One', 1), unit('b', 'Two', 1)])).toBe('# One\nx\n\n---\n\n# Two\nx');
  });
});

describe('BatchOptimizer.groupIntoBatches', () => {
  const { summarizer } = createStageSummarizer({});
  const driver = new SummarizationDriver(summarizer, tokenizer);

  it('should balance batches around total / ceil(total / target)', () => {
    const optimizer = new BatchOptimizer(driver, { targetTokens: 32000 });
    const units = [
      unit('a', 'Api a', 12000),
      unit('b', 'Api b', 10000),
      unit('c', 'Api c', 8000),
      unit('d', 'Api d', 6000),
      unit('e', 'Api e', 4000),
    ];

    const batches = optimizer.groupIntoBatches(units);

    expect(batches.map((b) => b.map((u) => u.id))).toEqual([
      ['a', 'b'],
      ['c', 'd', 'e'],
    ]);
  });

  it('should place larger units first', () => {
    const optimizer = new BatchOptimizer(driver, { targetTokens: 1000 });

    const batches = optimizer.groupIntoBatches([unit('s', 'Api s', 10), unit('l', 'Api l', 500)]);

    expect(batches.map((b) => b.map((u) => u.id))).toEqual([['l', 's']]);
  });

  it('should close a reasonably full batch at a topic change', () => {
    const optimizer = new BatchOptimizer(driver, { targetTokens: 1000 });
    const units = [
      unit('a1', 'Alpha one', 300),
      unit('a2', 'Alpha two', 300),
      unit('b1', 'Beta one', 200),
      unit('b2', 'Beta two', 200),
    ];

    const batches = optimizer.groupIntoBatches(units);

    expect(batches.map((b) => b.map((u) => u.id))).toEqual([
      ['a1', 'a2'],
      ['b1', 'b2'],
    ]);
  });

  it('should use an injected topic boundary', () => {
    const optimizer = new BatchOptimizer(driver, { targetTokens: 1000 }, () => false);
    const units = [
      unit('a1', 'Alpha one', 300),
      unit('a2', 'Alpha two', 300),
      unit('b1', 'Beta one', 200),
      unit('b2', 'Beta two', 200),
    ];

    expect(optimizer.groupIntoBatches(units)).toHaveLength(1);
  });

  it('should return no batches for no units', () => {
    const optimizer = new BatchOptimizer(driver);

    expect(optimizer.groupIntoBatches([])).toEqual([]);
  });
});

describe('BatchOptimizer.reduce', () => {
  it('should return units within budget unchanged', async () => {
    const { summarizer, summarize } = createStageSummarizer({ aggressive: 1 });
    const units = [unit('a', 'Api a', 100)];

    const result = await optimizerFor(summarizer).reduce(units);

    expect(result.state).toBe('DONE');
    expect(result.stagesRun).toBe(1);
    expect(result.units).toEqual(units);
    expect(result.rounds).toEqual([]);
    expect(summarize).not.toHaveBeenCalled();
  });

  it('should finish DONE for an empty set', async () => {
    const { summarizer } = createStageSummarizer({});

    const result = await optimizerFor(summarizer).reduce([]);

    expect(result.state).toBe('DONE');
    expect(result.report).toEqual({ totalTokens: 0, targetTokens: 160, metTarget: true });
  });

  it('should stop after the aggressive round once within target', async () => {
    const { summarizer, summarize } = createStageSummarizer({ aggressive: 10 });

    const result = await optimizerFor(summarizer).reduce(apiUnits());

    expect(result.state).toBe('DONE');
    expect(result.stagesRun).toBe(2);
    expect(result.units.map((u) => u.id)).toEqual(['optimized-batch-1', 'optimized-batch-2']);
    expect(result.units[0]).toMatchObject({
      title: 'Optimized Batch 1',
      outputKey: 'optimized_batch_1',
      order: 0,
      tokenCount: 10,
    });
    expect(result.rounds).toEqual([
      { stage: 'aggressive', successful: 2, attempted: 2, inputTokens: 200, outputTokens: 20 },
    ]);
    expect(summarize.mock.calls[0]?.[0]).toBe('# Api a\nx\n\n---\n\n# Api b\nx');
    expect(summarize.mock.calls[0]?.[1]).toBe('aggressive');
  });

  it('should collapse into one final summary when batches stay over target', async () => {
    const { summarizer, summarize } = createStageSummarizer({ aggressive: 100, extreme: 50 });

    const result = await optimizerFor(summarizer).reduce(apiUnits());

    expect(result.state).toBe('DONE');
    expect(result.stagesRun).toBe(3);
    expect(result.units).toHaveLength(1);
    expect(result.units[0]).toMatchObject({
      id: 'final-optimized-summary',
      title: FINAL_SUMMARY_TITLE,
      outputKey: 'final_optimized_summary',
      tokenCount: 50,
    });
    expect(result.rounds.map((r) => [r.stage, r.inputTokens, r.outputTokens])).toEqual([
      ['aggressive', 200, 200],
      ['extreme', 200, 50],
    ]);
    expect(summarize).toHaveBeenCalledTimes(3);
  });

  it('should report over budget after the last stage', async () => {
    const { summarizer } = createStageSummarizer({ aggressive: 100, extreme: 170 });

    const result = await optimizerFor(summarizer).reduce(apiUnits());

    expect(result.state).toBe('DONE_OVER_BUDGET');
    expect(result.report).toEqual({ totalTokens: 170, targetTokens: 160, metTarget: false });
  });

  it('should honour the stage ceiling', async () => {
    const { summarizer, summarize } = createStageSummarizer({ aggressive: 100, extreme: 10 });

    const result = await optimizerFor(summarizer, 2).reduce(apiUnits());

    expect(result.state).toBe('DONE_OVER_BUDGET');
    expect(result.stagesRun).toBe(2);
    expect(result.rounds).toHaveLength(1);
    expect(summarize.mock.calls.every((call) => call[1] === 'aggressive')).toBe(true);
  });

  it('should not summarize at all with a single stage', async () => {
    const { summarizer, summarize } = createStageSummarizer({ aggressive: 10 });

    const result = await optimizerFor(summarizer, 1).reduce(apiUnits());

    expect(result.state).toBe('DONE_OVER_BUDGET');
    expect(result.stagesRun).toBe(1);
    expect(totalTokens(result.units)).toBe(200);
    expect(summarize).not.toHaveBeenCalled();
  });

  it('should keep the previous units when a round yields nothing', async () => {
    const { summarizer, summarize } = createStageSummarizer({ aggressive: null, extreme: 50 });

    const result = await optimizerFor(summarizer).reduce(apiUnits());

    expect(result.rounds[0]).toEqual({
      stage: 'aggressive',
      successful: 0,
      attempted: 2,
      inputTokens: 200,
      outputTokens: 200,
    });
    expect(result.state).toBe('DONE');
    expect(result.units.map((u) => u.id)).toEqual(['final-optimized-summary']);
    expect(summarize.mock.calls[2]?.[0]).toBe(renderBatch(apiUnits()));
  });

  it('should refuse to start a round once aborted', async () => {
    const { summarizer, summarize } = createStageSummarizer({ aggressive: 10 });
    const controller = new AbortController();
    controller.abort();

    await expect(
      optimizerFor(summarizer).reduce(apiUnits(), { signal: controller.signal })
    ).rejects.toThrow(new PipelineAbortedError('aggressive round').message);
    expect(summarize).not.toHaveBeenCalled();
  });

  it('should stop before the extreme round when aborted mid-run', async () => {
    const controller = new AbortController();
    const summarizer: TextSummarizer = {
      summarize: async () => {
        controller.abort();
        return words(100);
      },
    };

    await expect(
      optimizerFor(summarizer).reduce(apiUnits(), { signal: controller.signal })
    ).rejects.toThrow('Pipeline aborted before extreme round');
  });
});
