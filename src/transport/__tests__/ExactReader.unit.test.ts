import assert from 'node:assert/strict';
import { PassThrough } from 'node:stream';
import { describe, it } from 'node:test';

import { FramingError } from '@/protocol/errors.js';
import { ExactReader } from '@/transport/ExactReader.js';

function bytes(text: string): Buffer {
  return Buffer.from(text, 'latin1');
}

void describe('ExactReader', () => {
  void it('assembles a read from several chunks', async () => {
    const stream = new PassThrough();
    const reader = new ExactReader(stream);

    const read = reader.read(6);
    stream.write(bytes('ab'));
    stream.write(bytes('cd'));
    stream.write(bytes('efgh'));

    assert.equal((await read).toString('latin1'), 'abcdef');
    assert.equal((await reader.read(2)).toString('latin1'), 'gh');
    assert.equal(reader.bytesReceived, 8);
  });

  void it('serves consecutive reads from one chunk', async () => {
    const stream = new PassThrough();
    const reader = new ExactReader(stream);
    stream.write(bytes('res:abcdef'));

    assert.equal((await reader.read(3)).toString('latin1'), 'res');
    assert.equal((await reader.read(1)).toString('latin1'), ':');
    assert.equal((await reader.read(6)).toString('latin1'), 'abcdef');
  });

  void it('resolves a zero-length read immediately', async () => {
    const reader = new ExactReader(new PassThrough());

    assert.equal((await reader.read(0)).length, 0);
  });

  void it('allows only one pending read', async () => {
    const stream = new PassThrough();
    const reader = new ExactReader(stream);

    const first = reader.read(2);
    await assert.rejects(reader.read(1), /one pending read at a time/);
    stream.write(bytes('ok'));
    assert.equal((await first).toString('latin1'), 'ok');
  });

  void it('fails with FramingError when the stream ends short', async () => {
    const stream = new PassThrough();
    const reader = new ExactReader(stream);

    const read = reader.read(7);
    stream.end(bytes('abc'));

    await assert.rejects(read, (error: unknown) => {
      assert.ok(error instanceof FramingError);
      assert.equal(error.message, 'Connection closed after 3 of 7 expected bytes');
      return true;
    });
  });

  void it('serves buffered bytes before reporting a failure', async () => {
    const stream = new PassThrough();
    const reader = new ExactReader(stream);
    stream.write(bytes('abcd'));
    await new Promise((resolve) => setImmediate(resolve));

    const failure = new Error('timed out');
    reader.fail(failure);

    assert.equal((await reader.read(4)).toString('latin1'), 'abcd');
    await assert.rejects(reader.read(1), (error: unknown) => error === failure);
  });

  void it('keeps the first failure', async () => {
    const reader = new ExactReader(new PassThrough());
    const first = new Error('first');

    reader.fail(first);
    reader.fail(new Error('second'));

    await assert.rejects(reader.read(1), (error: unknown) => error === first);
  });
});
