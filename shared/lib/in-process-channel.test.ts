import { describe, test } from 'node:test';
import assert from 'node:assert';
import { InProcessRequestReply, InProcessTopic } from './in-process-channel.js';

describe('InProcessRequestReply', () => {
  test('delivers a request and its reply', async () => {
    const channel = new InProcessRequestReply();
    const client = channel.connect();

    assert.strictEqual(await client.send('ping', 100), true);
    const request = await channel.server.receive(100);
    assert.ok(request);
    assert.strictEqual(request.payload, 'ping');
    assert.strictEqual(await request.reply('pong', 100), true);
    assert.strictEqual(await client.receive(100), 'pong');
  });

  test('allows one outstanding exchange per client', async () => {
    const channel = new InProcessRequestReply();
    const client = channel.connect();
    assert.strictEqual(await client.send('first', 100), true);
    assert.strictEqual(await client.send('second', 100), false);
  });

  test('a timed-out receive keeps the exchange outstanding', async () => {
    const channel = new InProcessRequestReply();
    const client = channel.connect();
    await client.send('slow', 100);

    assert.strictEqual(await client.receive(10), null);
    const request = await channel.server.receive(100);
    assert.ok(request);
    await request.reply('done', 100);
    assert.strictEqual(await client.receive(100), 'done');
  });

  test('the reply to a cancelled exchange is not delivered', async () => {
    const channel = new InProcessRequestReply();
    const client = channel.connect();
    await client.send('abandoned', 100);
    const request = await channel.server.receive(100);
    assert.ok(request);

    client.cancel();
    assert.strictEqual(await request.reply('too late', 100), false);
    assert.strictEqual(await client.send('next', 100), true);
  });

  test('serves requests of several clients in arrival order', async () => {
    const channel = new InProcessRequestReply();
    const a = channel.connect();
    const b = channel.connect();
    await a.send('from-a', 100);
    await b.send('from-b', 100);

    const first = await channel.server.receive(100);
    const second = await channel.server.receive(100);
    assert.strictEqual(first?.payload, 'from-a');
    assert.strictEqual(second?.payload, 'from-b');
  });

  test('receive returns null once the server side is closed', async () => {
    const channel = new InProcessRequestReply();
    await channel.server.close();
    assert.strictEqual(await channel.server.receive(), null);
    assert.strictEqual(await channel.connect().send('x', 100), false);
  });
});

describe('InProcessTopic', () => {
  test('subscribers only see messages published after subscribing', async () => {
    const topic = new InProcessTopic();
    await topic.publish('before');
    const subscriber = topic.subscribe();
    await topic.publish('after');

    assert.strictEqual(await subscriber.receive(100), 'after');
    assert.strictEqual(await subscriber.receive(10), null);
    assert.deepStrictEqual(topic.published, ['before', 'after']);
  });

  test('closing a subscriber detaches it', async () => {
    const topic = new InProcessTopic();
    const subscriber = topic.subscribe();
    assert.strictEqual(topic.subscriberCount, 1);
    await subscriber.close();
    assert.strictEqual(topic.subscriberCount, 0);
  });
});
