import { LineQueue } from '../src/monitoring/logcat-stream';

describe('LineQueue', () => {
  it('serves buffered lines first', async () => {
    const queue = new LineQueue();
    queue.push('one');
    queue.push('two');

    expect(await queue.next(10)).toEqual({ kind: 'line', line: 'one' });
    expect(await queue.next(10)).toEqual({ kind: 'line', line: 'two' });
  });

  it('hands a line straight to a waiting reader', async () => {
    const queue = new LineQueue();
    const read = queue.next(1000);

    queue.push('late');

    expect(await read).toEqual({ kind: 'line', line: 'late' });
    expect(queue.size).toBe(0);
  });

  it('times out when nothing arrives', async () => {
    const queue = new LineQueue();
    expect(await queue.next(5)).toEqual({ kind: 'timeout' });
  });

  it('keeps lines pushed after a timeout for the next read', async () => {
    const queue = new LineQueue();
    await queue.next(5);

    queue.push('after');

    expect(await queue.next(5)).toEqual({ kind: 'line', line: 'after' });
  });

  it('reports the end to a waiting reader and to later reads', async () => {
    const queue = new LineQueue();
    const read = queue.next(1000);

    queue.end();

    expect(await read).toEqual({ kind: 'end' });
    expect(await queue.next(10)).toEqual({ kind: 'end' });
  });

  it('drains buffered lines before reporting the end', async () => {
    const queue = new LineQueue();
    queue.push('last');
    queue.end();
    queue.push('ignored');

    expect(await queue.next(10)).toEqual({ kind: 'line', line: 'last' });
    expect(await queue.next(10)).toEqual({ kind: 'end' });
  });

  it('drops the oldest lines past its limit', async () => {
    const queue = new LineQueue(2);
    ['a', 'b', 'c'].forEach(line => queue.push(line));

    expect(queue.droppedCount).toBe(1);
    expect(await queue.next(10)).toEqual({ kind: 'line', line: 'b' });
  });

  it('allows a single reader at a time', async () => {
    const queue = new LineQueue();
    const first = queue.next(1000);

    await expect(queue.next(10)).rejects.toThrow('LineQueue supports a single reader');

    queue.end();
    await first;
  });
});
