import { describe, it, expect } from 'vitest';
import { buildResumeMessageContent, createResumeMessage, RESUME_MESSAGE_HEADER } from './resume-message';
import { at, buildSnapshot, completedTool } from '../../tests/utils/builders';

describe('buildResumeMessageContent', () => {
  const snapshot = buildSnapshot({
    lastActivity: at(125),
    currentPhase: 'analyzing',
    currentStrategy: 'Focus on the slowest endpoints',
    completedTools: [
      completedTool('file-read', true, { path: 'a.txt' }, 10),
      completedTool('file-write', false, {}, 20),
      completedTool('file-read', true, { path: 'b.txt' }, 30),
      completedTool('file-list', true, {}, 40),
    ],
    contextEvolution: {
      currentContext: {
        topic: 'tests',
        count: 3,
        notes: 'n'.repeat(250),
        flags: { fast: true },
        owner: 'team',
        extra: 'hidden',
      },
      keyInsights: ['first', 'second', 'third', 'fourth'],
      changes: [],
    },
  });
  const lines = buildResumeMessageContent(snapshot).split('\n');

  it('starts with the resume header', () => {
    expect(lines[0]).toBe(RESUME_MESSAGE_HEADER);
  });

  it('summarizes the previous session', () => {
    expect(lines).toContain('• Workflow: workflow_demo_20250101_000000_0000abcd');
    expect(lines).toContain('• Phase when interrupted: analyzing');
    expect(lines).toContain('• Last strategy: Focus on the slowest endpoints');
    expect(lines).toContain('• Session duration: 02:05');
  });

  it('lists distinct successful tools and the latest insights', () => {
    expect(lines).toContain('• Tools successfully executed: file-read, file-list');
    expect(lines).toContain('• Key discoveries made: second; third; fourth');
    expect(lines).toContain('• Context variables collected: 6 items');
  });

  it('shows at most five context values, truncated', () => {
    const stateIndex = lines.indexOf('CURRENT STATE:');
    expect(lines.slice(stateIndex + 1, stateIndex + 6)).toEqual([
      '• topic: tests',
      '• count: 3',
      `• notes: ${'n'.repeat(200)}...`,
      '• flags: {"fast":true}',
      '• owner: team',
    ]);
    expect(lines[stateIndex + 6]).toBe('');
  });

  it('says none when nothing has happened yet', () => {
    const empty = buildResumeMessageContent(buildSnapshot()).split('\n');

    expect(empty).toContain('• Tools successfully executed: none');
    expect(empty).toContain('• Key discoveries made: none');
    expect(empty).toContain('• (no context variables)');
    expect(empty).toContain('• Session duration: 01:00');
  });
});

describe('createResumeMessage', () => {
  it('creates a system message stamped with the given time', () => {
    const message = createResumeMessage(buildSnapshot(), at(90));

    expect(message.role).toBe('system');
    expect(message.timestamp).toBe(at(90));
    expect(message.content?.startsWith(RESUME_MESSAGE_HEADER)).toBe(true);
  });
});
