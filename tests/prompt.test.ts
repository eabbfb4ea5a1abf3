import assert from 'node:assert/strict';
import { test } from 'node:test';
import { composePrompt } from '../src/ai/prompt';

test('retrieved snippets are embedded in a grounded prompt', () => {
  const prompt = composePrompt('  When are you open?  ', [
    { text: 'We are open 8am to 6pm, Monday to Friday.', score: 0.9 },
    { text: 'Emergency call-outs are available on weekends.', score: 0.4 },
  ]);

  assert.equal(prompt.shape, 'grounded');
  assert.equal(
    prompt.user,
    'Context:\n[1] We are open 8am to 6pm, Monday to Friday.\n[2] Emergency call-outs are available on weekends.\n\nQuestion:\nWhen are you open?',
  );
  assert.ok(prompt.system.includes('prioritizing the information found in the context'));
});

test('an empty retrieval produces the distinct no-context prompt', () => {
  const prompt = composePrompt('When are you open?', []);

  assert.equal(prompt.shape, 'no_context');
  assert.equal(prompt.user, 'Question:\nWhen are you open?');
  assert.ok(prompt.system.includes('No information from the business knowledge base is available for this question.'));
  assert.ok(!prompt.user.includes('Context:'));
});
