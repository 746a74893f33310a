import { describe, it, expect } from 'vitest';
import {
  RoadVoidError,
  ConfigurationError,
  GeometryError,
  IOError,
  ScenarioFormatError,
} from './index.js';

describe('error taxonomy', () => {
  it('lists every configuration violation', () => {
    const err = new ConfigurationError(['a is wrong', 'b is wrong']);
    expect(err).toBeInstanceOf(RoadVoidError);
    expect(err.code).toBe('CONFIGURATION');
    expect(err.violations).toEqual(['a is wrong', 'b is wrong']);
    expect(err.message).toBe(
      'Invalid configuration (2 violation(s)):\n  1. a is wrong\n  2. b is wrong'
    );
  });

  it('names the sequence and stage of a geometry failure', () => {
    const err = new GeometryError('void escapes road').at({ sequenceId: 2, stage: 4 });
    expect(err.message).toBe('void escapes road (sequence 2, stage 4)');
    expect(err.sequenceId).toBe(2);
    expect(err.stage).toBe(4);
  });

  it('wraps the underlying cause of an I/O failure', () => {
    const cause = new Error('EACCES: permission denied');
    const err = new IOError('/out/seq_0000_stage_00.in', cause, { sequenceId: 0, stage: 0 });
    expect(err.message).toBe(
      'Cannot write /out/seq_0000_stage_00.in (sequence 0, stage 0): EACCES: permission denied'
    );
    expect(err.cause).toBe(cause);
    expect(err.path).toBe('/out/seq_0000_stage_00.in');
    expect(err.operation).toBe('write');
  });

  it('names read failures', () => {
    const err = new IOError('config/simulation.yaml', new Error('ENOENT: no such file'), {}, 'read');
    expect(err.message).toBe('Cannot read config/simulation.yaml: ENOENT: no such file');
  });

  it('prefixes scenario format errors with the line', () => {
    expect(new ScenarioFormatError('unknown keyword', 3).message).toBe('Line 3: unknown keyword');
    expect(new ScenarioFormatError('unknown keyword').message).toBe('unknown keyword');
  });
});
