import { describe, expect, it, vi } from 'vitest';

import {
  buildAgentSystemPrompt,
  executeAgentTask,
  getAgentInfo,
  requireText,
  validateTextInput,
} from '../../../src/ai/content/agents/shared';
import { RESEARCH_AGENT } from '../../../src/ai/content/agents/research';
import { ALL_AGENTS } from '../../../src/ai/content/agents';
import { AGENT_CONFIG } from '../../../src/ai/content/config';
import { createTestAgentDeps, mockGenerateText, promptOf } from '../../helpers/agent-deps';

describe('agent profiles', () => {
  it('registers the five specialists', () => {
    expect(ALL_AGENTS.map((agent) => agent.name)).toEqual([
      'Research Specialist',
      'Content Writer',
      'Content Editor',
      'SEO Specialist',
      'Creative Specialist',
    ]);
  });

  it('exposes name, role and goal', () => {
    expect(getAgentInfo(RESEARCH_AGENT)).toEqual({
      name: RESEARCH_AGENT.name,
      role: RESEARCH_AGENT.role,
      goal: RESEARCH_AGENT.goal,
    });
  });

  it('builds the system prompt from the profile', () => {
    const prompt = buildAgentSystemPrompt(RESEARCH_AGENT);

    expect(prompt.startsWith('You are the Research Specialist.')).toBe(true);
    expect(prompt).toContain(`Role: ${RESEARCH_AGENT.role}`);
    expect(prompt).toContain(`Goal: ${RESEARCH_AGENT.goal}`);
  });
});

describe('text input checks', () => {
  it('validateTextInput accepts only non-blank strings', () => {
    expect(validateTextInput('bees')).toBe(true);
    expect(validateTextInput('   ')).toBe(false);
    expect(validateTextInput(null)).toBe(false);
  });

  it('requireText trims valid input', () => {
    expect(requireText('  bees  ', 'Topic cannot be empty')).toBe('bees');
  });

  it('requireText throws INVALID_INPUT with the given message', () => {
    expect(() => requireText('', 'Topic cannot be empty')).toThrow(
      expect.objectContaining({ code: 'INVALID_INPUT', message: 'Topic cannot be empty' })
    );
  });
});

describe('executeAgentTask', () => {
  it('sends the system prompt, description and temperature', async () => {
    const generateText = mockGenerateText('  answer  ');
    const deps = createTestAgentDeps(generateText);

    const result = await executeAgentTask(RESEARCH_AGENT, 'Find facts', undefined, deps);

    expect(result).toEqual({ text: 'answer', tokenUsage: { input: 10, output: 20 } });
    expect(generateText).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'test-model',
        temperature: AGENT_CONFIG.TEMPERATURE,
        system: buildAgentSystemPrompt(RESEARCH_AGENT),
        prompt: 'Find facts',
        abortSignal: expect.any(AbortSignal),
      })
    );
  });

  it('appends context as JSON', async () => {
    const generateText = mockGenerateText('ok');

    await executeAgentTask(RESEARCH_AGENT, 'Find facts', { topic: 'bees' }, createTestAgentDeps(generateText));

    expect(promptOf(generateText)).toBe('Find facts\n\nContext: {"topic":"bees"}');
  });

  it('uses a temperature override', async () => {
    const generateText = mockGenerateText('ok');

    await executeAgentTask(RESEARCH_AGENT, 'Find facts', undefined, createTestAgentDeps(generateText, { temperature: 0.2 }));

    expect(generateText).toHaveBeenCalledWith(expect.objectContaining({ temperature: 0.2 }));
  });

  it('logs and rethrows model errors', async () => {
    const generateText = vi.fn().mockRejectedValue(new Error('Invalid API key'));
    const deps = createTestAgentDeps(generateText);

    await expect(executeAgentTask(RESEARCH_AGENT, 'Find facts', undefined, deps)).rejects.toThrow('Invalid API key');
    expect(deps.logger?.error).toHaveBeenCalledWith('Error executing task: Invalid API key');
  });
});
