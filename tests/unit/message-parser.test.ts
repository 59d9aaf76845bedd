import { describe, test } from 'node:test';
import assert from 'node:assert';
import { formatSender, htmlToText, parseMessage } from '../../src/services/graph/message-parser.js';
import { graphMessage } from '../helpers/test-fixtures.js';

describe('Graph message parser', () => {
  test('htmlToText - strips tags and decodes entities', () => {
    assert.strictEqual(htmlToText('<p>Hello&nbsp;<b>World</b></p><p>Line 2</p>'), 'Hello World\nLine 2');
    assert.strictEqual(htmlToText('<style>p { color: red }</style>Hi<br/>there'), 'Hi\nthere');
    assert.strictEqual(htmlToText('a &lt;b&gt; &amp; c'), 'a <b> & c');
  });

  test('formatSender', () => {
    assert.strictEqual(
      formatSender({ id: 'm', from: { emailAddress: { name: ' Alice ', address: 'alice@example.com' } } }),
      'Alice <alice@example.com>'
    );
    assert.strictEqual(formatSender({ id: 'm', from: { emailAddress: { address: 'bob@example.com' } } }), 'bob@example.com');
    assert.strictEqual(formatSender({ id: 'm', from: { emailAddress: { name: 'Bob' } } }), 'Bob');
    assert.strictEqual(formatSender({ id: 'm', from: null }), '(unknown)');
  });

  test('parseMessage - normalizes a Graph message', () => {
    const message = parseMessage(graphMessage());

    assert.strictEqual(message.id, 'msg-1');
    assert.strictEqual(message.subject, 'Quarterly report');
    assert.strictEqual(message.sender, 'Alice <alice@example.com>');
    assert.strictEqual(message.bodyText, 'Please review the attached quarterly report.');
    assert.strictEqual(message.receivedAt?.toISOString(), '2026-03-02T09:00:00.000Z');
    assert.strictEqual(message.isRead, false);
  });

  test('parseMessage - html body, missing subject, bad date', () => {
    const message = parseMessage(
      graphMessage({
        subject: null,
        receivedDateTime: 'not a date',
        body: { contentType: 'html', content: '<div>Ship it</div>' },
      })
    );

    assert.strictEqual(message.subject, '(no subject)');
    assert.strictEqual(message.receivedAt, null);
    assert.strictEqual(message.bodyText, 'Ship it');
  });

  test('parseMessage - falls back to bodyPreview and truncates', () => {
    assert.strictEqual(parseMessage(graphMessage({ body: null })).bodyText, 'Please review');
    assert.strictEqual(parseMessage(graphMessage(), 6).bodyText, 'Please');
  });

  test('parseMessage - rejects a resource without id', () => {
    assert.throws(() => parseMessage({ subject: 'no id' }));
  });
});
