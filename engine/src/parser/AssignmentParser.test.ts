import { describe, expect, it } from 'vitest';
import { PipevarsErrorCode } from '../errors/ErrorCodes.js';
import { AssignmentParser } from './AssignmentParser.js';

describe('AssignmentParser', () => {
  it('reads name=value lines in order', () => {
    const { assignments, errors } = AssignmentParser.parse('username=alice\nteam = core\n', 'static_inputs');
    expect(errors).toEqual([]);
    expect(assignments).toEqual([
      { name: 'username', rawValue: 'alice', line: 1 },
      { name: 'team', rawValue: 'core', line: 2 },
    ]);
  });

  it('skips blank lines and comments', () => {
    const { assignments } = AssignmentParser.parse('# header\n\n  # indented\r\nname=x\r\n', 'static_inputs');
    expect(assignments).toEqual([{ name: 'name', rawValue: 'x', line: 4 }]);
  });

  it('keeps later = signs in the value', () => {
    const { assignments } = AssignmentParser.parse('query=a=b&c=d', 'static_inputs');
    expect(assignments[0]?.rawValue).toBe('a=b&c=d');
  });

  it('removes one pair of surrounding quotes in static mode', () => {
    const { assignments } = AssignmentParser.parse(`a="quoted"\nb='single'\nc="'nested'"\nd=""`, 'static_inputs');
    expect(assignments.map(assignment => assignment.rawValue)).toEqual(['quoted', 'single', "'nested'", '']);
  });

  it('keeps quotes in expression mode', () => {
    const { assignments } = AssignmentParser.parse(`team='' or 'default_team'`, 'jinja_inputs', 'expression');
    expect(assignments[0]?.rawValue).toBe(`'' or 'default_team'`);
  });

  it('keeps empty values', () => {
    const { assignments } = AssignmentParser.parse('username=', 'static_inputs');
    expect(assignments).toEqual([{ name: 'username', rawValue: '', line: 1 }]);
  });

  it('reports malformed lines and parses the rest', () => {
    const { assignments, errors } = AssignmentParser.parse(
      'first=1\nno separator\n=value\n9lives=x\nopen="abc\nlast=2',
      'static_inputs'
    );
    expect(assignments.map(assignment => assignment.name)).toEqual(['first', 'last']);
    expect(errors.map(error => error.code)).toEqual([
      PipevarsErrorCode.ASSIGNMENT_MISSING_EQUALS,
      PipevarsErrorCode.ASSIGNMENT_INVALID_NAME,
      PipevarsErrorCode.ASSIGNMENT_INVALID_NAME,
      PipevarsErrorCode.ASSIGNMENT_UNTERMINATED_QUOTE,
    ]);
    expect(errors.map(error => error.path)).toEqual([
      'static_inputs:2',
      'static_inputs:3',
      'static_inputs:4',
      'static_inputs:5',
    ]);
  });

  it('accepts dotted and dashed names', () => {
    const { assignments, errors } = AssignmentParser.parse('app.version=1.2\nrelease-tag=v1', 'static_inputs');
    expect(errors).toEqual([]);
    expect(assignments.map(assignment => assignment.name)).toEqual(['app.version', 'release-tag']);
  });
});
