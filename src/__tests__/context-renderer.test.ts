import { describe, it, expect } from 'vitest';
import { buildContext } from '../context/contextAssembler.js';
import { ContextRenderer, renderContext } from '../context/contextRenderer.js';
import { SessionLog } from '../log/sessionLog.js';

function tavernLog(): SessionLog {
  let ids = 0;
  const log = SessionLog.create({ sessionId: 'render', generateId: (kind) => `${kind}-${++ids}` });
  log.startScene({ title: 'Road' });
  log.logEvent('narration', null, { text: 'Mud everywhere.' });
  log.endScene('They walked north.');
  log.startScene({ title: 'Gate', location: 'North gate' });
  log.logEvent('narration', null, { text: 'Guards watch.' });
  log.endScene();
  log.startScene({ title: 'Tavern', location: 'Inn' });
  log.logEvent('npc_action', 'Bard', { text: 'Hello' });
  log.logEvent('narration', null, { text: 'The fire crackles.' });
  return log;
}

describe('ContextRenderer', () => {
  it('renders summaries, recent scenes and the current scene in order', () => {
    const pkg = buildContext(tavernLog().snapshot(), { maxTokens: 1000, recentScenes: 1 });
    expect(new ContextRenderer().render(pkg)).toBe(
      [
        '## Earlier: Road',
        'They walked north.',
        '',
        '## Gate',
        'Location: North gate',
        'Guards watch.',
        '',
        '## Tavern',
        'Location: Inn',
        '[Bard] Hello',
        'The fire crackles.'
      ].join('\n')
    );
  });

  it('falls back to generic headings for untitled scenes', () => {
    const log = SessionLog.create();
    log.startScene();
    log.logEvent('system', null, { text: 'Session resumed.' });
    const pkg = buildContext(log.snapshot(), { maxTokens: 1000, recentScenes: 1 });
    expect(renderContext(pkg)).toBe('## Current scene\nSession resumed.');
  });
});
