import { Semaphore, mapWithConcurrency } from 'src/utils/concurrency';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('Semaphore', () => {
  it('hands out at most `capacity` permits at once', async () => {
    const semaphore = new Semaphore(1);
    const releaseFirst = await semaphore.acquire();

    let secondAcquired = false;
    const second = semaphore.acquire().then((release) => {
      secondAcquired = true;
      return release;
    });

    await Promise.resolve();
    expect(secondAcquired).toBe(false);

    releaseFirst();
    const releaseSecond = await second;
    expect(secondAcquired).toBe(true);
    releaseSecond();
  });
});

describe('mapWithConcurrency', () => {
  it('keeps input order when calls finish out of order', async () => {
    const gates = [deferred<void>(), deferred<void>(), deferred<void>()];
    const run = mapWithConcurrency(['a', 'b', 'c'], 3, async (item, index) => {
      await gates[index].promise;
      return item.toUpperCase();
    });

    gates[2].resolve();
    gates[0].resolve();
    gates[1].resolve();

    await expect(run).resolves.toEqual(['A', 'B', 'C']);
  });

  it('never exceeds the limit', async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async (value) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setImmediate(resolve));
      inFlight -= 1;
      return value;
    });

    expect(peak).toBe(2);
  });
});
