import { findOutdatedSteps, hasOutdatedRuntime } from '../src/services/runtime-classifier.js';
import { createLogger } from '../src/utils/logger.js';
import { DEFAULT_OLD_RUNTIMES } from '../src/config.js';
import { executeScriptStep } from './fixtures/fake-ssm.js';

describe('hasOutdatedRuntime', () => {
  const denylist = DEFAULT_OLD_RUNTIMES;

  it('should flag an executeScript step on a denylisted runtime', () => {
    const content = { mainSteps: [{ action: 'aws:executeScript', inputs: { Runtime: 'python3.7' } }] };

    expect(hasOutdatedRuntime(content, denylist)).toBe(true);
  });

  it('should not flag a runtime outside the denylist', () => {
    const content = { mainSteps: [{ action: 'aws:executeScript', inputs: { Runtime: 'python3.11' } }] };

    expect(hasOutdatedRuntime(content, denylist)).toBe(false);
  });

  it.each([
    ['null', null],
    ['undefined', undefined],
    ['a string', 'mainSteps'],
    ['a number', 42],
    ['an array', [executeScriptStep('python3.7')]],
    ['an object without mainSteps', { schemaVersion: '0.3' }],
    ['mainSteps that is not an array', { mainSteps: 'aws:executeScript' }],
    ['an empty mainSteps', { mainSteps: [] }],
  ])('should return false for %s', (_label, content) => {
    expect(hasOutdatedRuntime(content, denylist)).toBe(false);
  });

  it('should ignore steps with other actions even when they carry a Runtime', () => {
    const content = {
      mainSteps: [
        { action: 'aws:executeAwsApi', inputs: { Runtime: 'python3.7' } },
        { action: 'aws:runCommand', inputs: { Runtime: 'python2.7' } },
      ],
    };

    expect(hasOutdatedRuntime(content, denylist)).toBe(false);
  });

  it('should ignore steps without inputs, without Runtime, or with a non-string Runtime', () => {
    const content = {
      mainSteps: [
        'aws:executeScript',
        null,
        { action: 'aws:executeScript' },
        { action: 'aws:executeScript', inputs: 'python3.7' },
        { action: 'aws:executeScript', inputs: { Handler: 'handler' } },
        { action: 'aws:executeScript', inputs: { Runtime: 3.7 } },
        { action: 'aws:executeScript', inputs: { Runtime: ['python3.7'] } },
      ],
    };

    expect(hasOutdatedRuntime(content, denylist)).toBe(false);
  });

  it('should compare runtimes by exact string equality', () => {
    const content = {
      mainSteps: [
        executeScriptStep('Python3.7'),
        executeScriptStep('python3.7 '),
        executeScriptStep('python3'),
      ],
    };

    expect(hasOutdatedRuntime(content, denylist)).toBe(false);
  });

  it('should flag the document when any one step qualifies', () => {
    const content = {
      description: 'Restarts the fleet',
      mainSteps: [
        { name: 'approve', action: 'aws:approve', inputs: { Approvers: ['ops'] } },
        executeScriptStep('python3.11', 'modern'),
        executeScriptStep('python3.6', 'legacy'),
      ],
    };

    expect(hasOutdatedRuntime(content, denylist)).toBe(true);
  });

  it('should still flag a step whose name is not a string', () => {
    const content = { mainSteps: [{ name: 7, action: 'aws:executeScript', inputs: { Runtime: 'python3.8' } }] };

    expect(hasOutdatedRuntime(content, denylist)).toBe(true);
  });

  it('should use only the given denylist', () => {
    const content = { mainSteps: [executeScriptStep('python3.10')] };

    expect(hasOutdatedRuntime(content, ['python3.10'])).toBe(true);
    expect(hasOutdatedRuntime(content, [])).toBe(false);
  });

  it('should stop at the first matching step and log it at debug level', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'DEBUG', sink: line => lines.push(line) });
    const content = {
      mainSteps: [executeScriptStep('python3.9', 'first'), executeScriptStep('python3.8', 'second')],
    };

    expect(hasOutdatedRuntime(content, denylist, logger)).toBe(true);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("Found outdated runtime 'python3.9' in step 'first'");
  });
});

describe('findOutdatedSteps', () => {
  it('should list every outdated step with its position and name', () => {
    const content = {
      mainSteps: [
        executeScriptStep('python3.8', 'collect'),
        executeScriptStep('python3.12', 'report'),
        executeScriptStep('python2.7'),
      ],
    };

    expect(findOutdatedSteps(content, DEFAULT_OLD_RUNTIMES)).toEqual([
      { index: 0, name: 'collect', runtime: 'python3.8' },
      { index: 2, name: 'UnnamedStep', runtime: 'python2.7' },
    ]);
  });

  it('should return an empty list for content that is not a document', () => {
    expect(findOutdatedSteps(null, DEFAULT_OLD_RUNTIMES)).toEqual([]);
  });
});
