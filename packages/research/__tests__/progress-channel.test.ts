import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { setImmediate as tick } from 'node:timers/promises';

import { ProgressChannel } from '../src/index.js';
import { collect } from './fakes.js';

describe('ProgressChannel', () => {
  it('rejects a non-positive capacity', () => {
    assert.throws(() => new ProgressChannel(0), /positive integer/);
  });

  it('suspends the producer while the buffer is full', async () => {
    const channel = new ProgressChannel<number>(1);
    await channel.send(1);

    let delivered = false;
    const pending = channel.send(2).then(() => {
      delivered = true;
    });

    await tick();
    assert.equal(delivered, false);
    assert.equal(channel.size, 1);

    const iterator = channel[Symbol.asyncIterator]();
    assert.deepEqual(await iterator.next(), { done: false, value: 1 });
    await pending;
    assert.equal(delivered, true);
    assert.deepEqual(await iterator.next(), { done: false, value: 2 });
  });

  it('delivers buffered values after close', async () => {
    const channel = new ProgressChannel<string>(4);
    await channel.send('a');
    await channel.send('b');
    channel.close();

    assert.deepEqual(await collect(channel), ['a', 'b']);
    await assert.rejects(channel.send('c'), /closed/);
  });

  it('releases a blocked producer when the consumer detaches', async () => {
    const channel = new ProgressChannel<number>(1);
    await channel.send(1);
    const pending = channel.send(2);

    channel.detach();
    await pending;
    await channel.send(3);

    assert.equal(channel.isDetached, true);
    assert.equal(channel.size, 0);
  });

  it('detaches when the consumer stops iterating', async () => {
    const channel = new ProgressChannel<number>(2);
    await channel.send(1);
    await channel.send(2);

    for await (const value of channel) {
      assert.equal(value, 1);
      break;
    }

    assert.equal(channel.isDetached, true);
  });

  it('supports a single consumer', () => {
    const channel = new ProgressChannel<number>();
    channel[Symbol.asyncIterator]();
    assert.throws(() => channel[Symbol.asyncIterator](), /single consumer/);
  });
});
