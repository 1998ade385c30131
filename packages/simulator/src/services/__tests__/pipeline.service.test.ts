import { describe, it, expect } from 'vitest';
import { ErrorCode, TurnRole, Verdict, type ResultRow } from '@student-sim/shared';
import { groupByStudent, runPipeline } from '../pipeline.service.js';
import { MemoryResultSink, type ResultSink } from '../results.service.js';
import { ValidationError } from '../../utils/errors.js';
import { ScriptedModel, createRecord, summaryReply } from '../../__tests__/helpers/model.helper.js';

const lastText = (history: readonly { text: string }[]): string => history[history.length - 1].text;

describe('groupByStudent', () => {
  it('groups in order of first appearance and keeps record order', () => {
    const records = [
      createRecord({ studentId: 'b', problemText: 'b1' }),
      createRecord({ studentId: 'a', problemText: 'a1' }),
      createRecord({ studentId: 'b', problemText: 'b2' }),
    ];

    expect(
      groupByStudent(records).map((g) => [g.studentId, g.records.map((r) => r.problemText)]),
    ).toEqual([
      ['b', ['b1', 'b2']],
      ['a', ['a1']],
    ]);
  });
});

describe('runPipeline', () => {
  it('evaluates every student in order and numbers problems per student', async () => {
    const sink = new MemoryResultSink();
    const records = [
      createRecord({ studentId: 's1', problemText: 'p1' }),
      createRecord({ studentId: 's1', problemText: 'p2' }),
      createRecord({ studentId: 's2', problemText: 'p3' }),
    ];

    const result = await runPipeline({
      records,
      model: new ScriptedModel(() => summaryReply('yes', 'yes', 'yes')),
      sink,
    });

    expect(result.rows.map((r) => [r.studentId, r.problemNumber, r.problemText])).toEqual([
      ['s1', 1, 'p1'],
      ['s1', 2, 'p2'],
      ['s2', 1, 'p3'],
    ]);
    expect(result.studentCount).toBe(2);
    expect(result.failures).toEqual([]);
    expect(sink.rows).toEqual(result.rows);
  });

  it('starts each student with a fresh conversation', async () => {
    const model = new ScriptedModel(() => summaryReply('no', 'no', 'no'));

    await runPipeline({
      records: [
        createRecord({ studentId: 's1', problemText: 'first' }),
        createRecord({ studentId: 's1', problemText: 'second' }),
        createRecord({ studentId: 's2', problemText: 'third' }),
      ],
      model,
      sink: new MemoryResultSink(),
      systemPrompt: 'You are simulating a student.',
    });

    expect(model.calls).toHaveLength(3);
    expect(model.calls[1]).toHaveLength(5);
    expect(model.calls[2]).toEqual([
      { role: TurnRole.SYSTEM, text: 'You are simulating a student.' },
      { role: TurnRole.USER, text: 'third' },
    ]);
  });

  it('records a failed student and carries on with the next one', async () => {
    const model = new ScriptedModel((history) => {
      if (lastText(history) === 'breaks') throw new Error('quota exceeded');
      return summaryReply('yes', 'yes', 'yes');
    });
    const sink = new MemoryResultSink();

    const result = await runPipeline({
      records: [
        createRecord({ studentId: 's1', problemText: 'ok' }),
        createRecord({ studentId: 's2', problemText: 'ok' }),
        createRecord({ studentId: 's2', problemText: 'breaks' }),
        createRecord({ studentId: 's2', problemText: 'never posed' }),
        createRecord({ studentId: 's3', problemText: 'ok' }),
      ],
      model,
      sink,
    });

    expect(result.rows.map((r) => [r.studentId, r.problemNumber])).toEqual([
      ['s1', 1],
      ['s2', 1],
      ['s3', 1],
    ]);
    expect(result.failures).toEqual([
      {
        studentId: 's2',
        problemNumber: 2,
        code: ErrorCode.MODEL_ERROR,
        message: 'Model call failed on problem 2',
        details: { studentId: 's2', problemNumber: 2, reason: 'quota exceeded' },
      },
    ]);
    expect(model.calls.map(lastText)).not.toContain('never posed');
    expect(sink.rows).toHaveLength(3);
  });

  it('hands each row to the sink before the next model call', async () => {
    const events: string[] = [];
    const sink: ResultSink = {
      append: (row: ResultRow) => events.push(`row ${row.problemNumber}`),
    };
    const model = new ScriptedModel((_history, callIndex) => {
      events.push(`call ${callIndex}`);
      return summaryReply('yes', 'yes', 'yes');
    });

    await runPipeline({ records: [createRecord(), createRecord()], model, sink });

    expect(events).toEqual(['call 0', 'row 1', 'call 1', 'row 2']);
  });

  it('produces identical rows on repeated runs with a deterministic model', async () => {
    const records = [
      createRecord({ studentId: 's1', correctAnswer: Verdict.NO }),
      createRecord({ studentId: 's1' }),
      createRecord({ studentId: 's2', correctStrategy: Verdict.NO }),
    ];
    const reply = () => summaryReply('yes', 'no', 'yes');

    const first = await runPipeline({ records, model: new ScriptedModel(reply), sink: new MemoryResultSink() });
    const second = await runPipeline({ records, model: new ScriptedModel(reply), sink: new MemoryResultSink() });

    expect(second.rows).toEqual(first.rows);
  });

  it('stops the run when the sink cannot persist a row', async () => {
    const sink: ResultSink = {
      append: () => {
        throw new Error('disk full');
      },
    };

    await expect(
      runPipeline({
        records: [createRecord({ studentId: 's1' }), createRecord({ studentId: 's2' })],
        model: new ScriptedModel(() => 'reply'),
        sink,
      }),
    ).rejects.toThrow('disk full');
  });

  it('rejects an empty record list without calling the model', async () => {
    const model = new ScriptedModel(() => 'reply');

    await expect(
      runPipeline({ records: [], model, sink: new MemoryResultSink() }),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(model.calls).toHaveLength(0);
  });
});
