import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { buildMessages } from '../prompt.js';
import { DEFAULT_MODEL, OpenAISqlGenerator, type ChatCompletionsClient } from '../openai.js';

function fakeClient(content: string | null) {
  const requests: ChatCompletionCreateParamsNonStreaming[] = [];
  const client: ChatCompletionsClient = {
    chat: {
      completions: {
        async create(body) {
          requests.push(body);
          return { choices: [{ message: { content } }] };
        },
      },
    },
  };
  return { client, requests };
}

describe('buildMessages', () => {
  it('puts the schema context before the question', () => {
    const [system, user] = buildMessages({ question: 'How many loans?', schemaContext: 'DATABASE: demo' });

    assert.equal(system.role, 'system');
    assert.match(system.content, /only SELECT statements or CTE/);
    assert.match(system.content, /single ```sql fenced block\.$/);
    assert.deepEqual(user, { role: 'user', content: 'DATABASE: demo\n\nQuestion: How many loans?' });
  });

  it('says so when there is no schema context', () => {
    const [, user] = buildMessages({ question: 'q', schemaContext: '  \n' });
    assert.equal(user.content, 'No schema context is available.\n\nQuestion: q');
  });
});

describe('OpenAISqlGenerator', () => {
  it('sends the prompt with a low temperature and returns the raw reply', async () => {
    const { client, requests } = fakeClient('```sql\nSELECT 1\n```');
    const generator = new OpenAISqlGenerator({ client });

    const reply = await generator.generateSql({ question: 'one?', schemaContext: 'ctx' });

    assert.equal(reply, '```sql\nSELECT 1\n```');
    assert.equal(generator.model, DEFAULT_MODEL);
    assert.equal(requests.length, 1);
    assert.equal(requests[0].model, DEFAULT_MODEL);
    assert.equal(requests[0].temperature, 0.1);
    assert.deepEqual(requests[0].messages, buildMessages({ question: 'one?', schemaContext: 'ctx' }));
  });

  it('uses the configured model', async () => {
    const { client, requests } = fakeClient('SELECT 1');
    await new OpenAISqlGenerator({ client, model: 'gpt-4o' }).generateSql({ question: 'q', schemaContext: '' });
    assert.equal(requests[0].model, 'gpt-4o');
  });

  it('rejects an empty reply', async () => {
    const { client } = fakeClient(null);
    await assert.rejects(
      new OpenAISqlGenerator({ client }).generateSql({ question: 'q', schemaContext: '' }),
      /OpenAI returned empty response/,
    );
  });

  it('requires an API key when no client is given', () => {
    assert.throws(() => new OpenAISqlGenerator({ apiKey: '' }), /OpenAI API key is not configured/);
  });
});
