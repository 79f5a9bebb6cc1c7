/**
 * MSW Request Handlers
 *
 * OpenAI chat completions, answered by prompt. Each canned reply is shaped so the
 * agents' line parsers find something in it.
 */

import { http, HttpResponse } from 'msw';

export const OPENAI_CHAT_URL = 'https://api.openai.com/v1/chat/completions';

export const MOCK_USAGE = { prompt_tokens: 100, completion_tokens: 200, total_tokens: 300 } as const;

export const MOCK_REPLIES = {
  research: [
    'Key fact: Urban hives produce about 30 pounds of honey per season',
    'Key fact: City bees face fewer pesticides than rural bees',
    'Source: Urban Apiculture Report 2023',
    'Insight: Rooftop hives need wind protection',
    'Recommend starting with two hives',
  ].join('\n'),
  draft: 'Urban beekeeping draft about city hives.',
  review: ['Overall score: 8/10', 'Strong opening paragraph', 'Consider adding a safety section'].join('\n'),
  improved: 'Improved urban beekeeping guide for city residents.',
  seo: [
    'SEO score: 72',
    'Recommend adding the keyword to the first heading',
    'Optimized content:',
    'Urban beekeeping guide optimized for search.',
  ].join('\n'),
  metaTags: ['Title: Urban Beekeeping for Beginners', 'Description: Learn how to keep bees in the city'].join('\n'),
  headlines: ['Headline: How to Start Urban Beekeeping', 'Headline: Why City Bees Thrive'].join('\n'),
  fallback: 'Mock response',
} as const;

const REPLY_BY_PROMPT_PREFIX: ReadonlyArray<readonly [string, string]> = [
  ['Conduct ', MOCK_REPLIES.research],
  ['Create a ', MOCK_REPLIES.draft],
  ['Review the following', MOCK_REPLIES.review],
  ['Improve the following', MOCK_REPLIES.improved],
  ['Optimize the following', MOCK_REPLIES.seo],
  ['Write SEO meta tags', MOCK_REPLIES.metaTags],
  ['Brainstorm ', MOCK_REPLIES.headlines],
];

interface ChatMessage {
  readonly role: string;
  readonly content: string | ReadonlyArray<{ readonly type: string; readonly text?: string }>;
}

function messageText(message: ChatMessage | undefined): string {
  if (!message) return '';
  if (typeof message.content === 'string') return message.content;
  return message.content.map((part) => part.text ?? '').join('');
}

export function replyForPrompt(prompt: string): string {
  const match = REPLY_BY_PROMPT_PREFIX.find(([prefix]) => prompt.startsWith(prefix));
  return match ? match[1] : MOCK_REPLIES.fallback;
}

export function chatCompletion(model: string, content: string) {
  return {
    id: 'mock-completion-id',
    object: 'chat.completion',
    created: Math.floor(Date.now() / 1000),
    model,
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content },
        finish_reason: 'stop',
      },
    ],
    usage: MOCK_USAGE,
  };
}

export const handlers = [
  http.post(OPENAI_CHAT_URL, async ({ request }) => {
    const body = (await request.json()) as { messages: ChatMessage[]; model: string };
    const prompt = messageText(body.messages.find((m) => m.role === 'user'));
    return HttpResponse.json(chatCompletion(body.model, replyForPrompt(prompt)));
  }),
];
