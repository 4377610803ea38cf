import { describe, expect, it } from 'vitest';
import { formatWarnings, validate } from '../src/policy/validator';
import { parsePlan, parsePlanJson } from '../src/validation';
import { ValidationError } from '../src/errors';
import { Plan } from '../src/types';

function plan(commands: string[], risk: Plan['risk'] = 'low'): Plan {
  return { summary: 'test plan', risk, commands: commands.map(command => ({ command })) };
}

describe('validate', () => {
  it('gives LOW to an empty plan', () => {
    const verdict = validate(plan([]));
    expect(verdict.overall).toBe('LOW');
    expect(verdict.perCommand).toEqual([]);
    expect(verdict.blocked).toEqual([]);
    expect(verdict.underDeclared).toBe(false);
  });

  it('takes the most severe command verdict', () => {
    const verdict = validate(plan(['ls -la', 'mv a.txt b.txt', 'cat b.txt'], 'medium'));
    expect(verdict.overall).toBe('MEDIUM');
    expect(verdict.perCommand.map(v => v.verdict)).toEqual(['LOW', 'MEDIUM', 'LOW']);
    expect(verdict.perCommand.map(v => v.index)).toEqual([0, 1, 2]);
  });

  it('lists every blocked command in order', () => {
    const verdict = validate(plan(['rm -rf /', 'ls', 'mkfs.ext4 /dev/sda1']));
    expect(verdict.overall).toBe('BLOCKED');
    expect(verdict.blocked.map(v => v.index)).toEqual([0, 2]);
    expect(verdict.blocked.map(v => v.match?.ruleId)).toEqual(['recursive-root-deletion', 'filesystem-format']);
  });

  it('flags a plan that declares less risk than it carries', () => {
    const verdict = validate(plan(['sudo apt-get install nginx'], 'low'));
    expect(verdict.overall).toBe('HIGH');
    expect(verdict.declaredRisk).toBe('low');
    expect(verdict.underDeclared).toBe(true);
  });

  it('does not flag over-declared plans', () => {
    expect(validate(plan(['ls'], 'high')).underDeclared).toBe(false);
  });

  it('does not mutate the plan', () => {
    const input = parsePlan({ summary: 's', risk: 'low', commands: [{ command: 'rm notes.txt' }] });
    validate(input);
    expect(input.commands).toEqual([{ command: 'rm notes.txt' }]);
  });
});

describe('formatWarnings', () => {
  it('lists commands above LOW and the declared-risk mismatch', () => {
    const warnings = formatWarnings(validate(plan(['ls', 'rm notes.txt'], 'low')));
    expect(warnings).toEqual([
      'MEDIUM #2 rm notes.txt: Deletes files [delete]',
      'Plan declared low risk but was classified MEDIUM',
    ]);
  });

  it('is empty for a LOW plan', () => {
    expect(formatWarnings(validate(plan(['git status'])))).toEqual([]);
  });
});

describe('parsePlan', () => {
  const valid = {
    summary: 'Archive logs',
    risk: 'medium',
    commands: [{ command: 'mkdir -p archive', description: 'Create archive dir' }],
    affectedFiles: ['archive'],
  };

  it('accepts a valid plan and freezes it', () => {
    const parsed = parsePlan(valid);
    expect(parsed.summary).toBe('Archive logs');
    expect(Object.isFrozen(parsed)).toBe(true);
    expect(Object.isFrozen(parsed.commands)).toBe(true);
    expect(Object.isFrozen(parsed.commands[0])).toBe(true);
  });

  it('rejects unknown risk levels', () => {
    expect(() => parsePlan({ ...valid, risk: 'extreme' })).toThrow(ValidationError);
  });

  it('rejects empty commands', () => {
    expect(() => parsePlan({ ...valid, commands: [{ command: '' }] })).toThrow(/Command cannot be empty/);
  });

  it('rejects a plan that carries both commands and clarifications', () => {
    expect(() => parsePlan({ ...valid, clarifications: [{ question: 'Which directory?' }] })).toThrow(
      /either commands or clarification questions/
    );
  });

  it('accepts a clarification-only plan', () => {
    const parsed = parsePlan({
      summary: 'Need more detail',
      risk: 'low',
      commands: [],
      clarifications: [{ question: 'Which directory?', options: ['logs', 'tmp'] }],
    });
    expect(parsed.clarifications?.[0].options).toEqual(['logs', 'tmp']);
  });

  it('reports malformed JSON', () => {
    expect(() => parsePlanJson('{ not json')).toThrow(/^Plan is not valid JSON/);
  });
});
