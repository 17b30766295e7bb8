import { afterEach, describe, expect, it } from 'vitest';
import { StaticContextFetcher } from '../context/ContextFetcher.js';
import { DispatchDetector } from '../context/DispatchDetector.js';
import { StandardContextResolver } from '../context/StandardContextResolver.js';
import { PipevarsErrorCode } from '../errors/ErrorCodes.js';
import { CandidateTable } from '../merge/CandidateTable.js';
import { CoalescingMerger } from '../merge/CoalescingMerger.js';
import { OutputProjector } from '../output/OutputProjector.js';
import { AssignmentParser } from '../parser/AssignmentParser.js';
import { pushContext } from '../testing/PayloadBuilder.js';
import { TriggerType, VariableSource } from '../types/core-types.js';
import { LogLevel } from '../types/log-types.js';
import { LoggerManager } from './LoggerManager.js';

const discard = (): void => undefined;

describe('LoggerManager', () => {
  afterEach(() => {
    LoggerManager.reset();
    LoggerManager.initialize({ level: LogLevel.DEBUG, colors: false, sink: discard });
  });

  it('has no logger to offer after a reset', () => {
    LoggerManager.reset();
    expect(LoggerManager.tryGetLogger()).toBeNull();
    expect(() => LoggerManager.getLogger()).toThrow(/accessed before initialization/);
  });

  it('lets the resolution stages run without an initialized logger', () => {
    LoggerManager.reset();

    const parsed = AssignmentParser.parse('team=core', 'static_inputs', 'static');
    const standard = new StandardContextResolver().resolve(pushContext());
    const table = new CandidateTable();
    for (const assignment of parsed.assignments) {
      table.addUser(assignment.name, assignment.rawValue, VariableSource.STATIC);
    }
    const merged = CoalescingMerger.merge(table);
    const projection = OutputProjector.project(merged.resultSet, {
      userNames: new Set(['team']),
      suppliedExpressions: new Set(),
    });

    expect(standard.trigger).toBe(TriggerType.PUSH);
    expect(projection.outputs.get('team')).toBe('core');
  });

  it('lets dispatch detection record failures without an initialized logger', async () => {
    LoggerManager.reset();

    const detector = new DispatchDetector({ fetcher: new StaticContextFetcher(), timeoutMs: 100 });
    const detection = await detector.detect({ inputs: { pr_number: '99' } });

    expect(detection.errors.map(error => error.code)).toEqual([PipevarsErrorCode.CONTEXT_NOT_FOUND]);
  });
});
