import { expect } from "chai";
import { describe, it } from "mocha";

import { KeyedLock, PromptPrefixCache, commonPrefixLength } from "../../../services/promptCache/index.js";
import { ScriptedBackend } from "../../utils/index.js";

describe("KeyedLock", function () {
  it("grants the lock in request order", async function () {
    const lock = new KeyedLock();
    const order: string[] = [];

    const releaseFirst = await lock.acquire("tensor");
    const second = lock.acquire("tensor").then((release) => { order.push("second"); return release; });
    const third = lock.acquire("tensor").then((release) => { order.push("third"); return release; });
    expect(lock.queueLength("tensor")).to.equal(3);

    await Promise.resolve();
    expect(order).to.deep.equal([]);

    releaseFirst();
    const releaseSecond = await second;
    expect(order).to.deep.equal(["second"]);
    releaseSecond();
    const releaseThird = await third;
    expect(order).to.deep.equal(["second", "third"]);

    releaseThird();
    expect(lock.queueLength("tensor")).to.equal(0);
  });

  it("does not block other keys", async function () {
    const lock = new KeyedLock();
    const releaseA = await lock.acquire("a");
    const releaseB = await lock.acquire("b");
    expect(lock.queueLength("a")).to.equal(1);
    expect(lock.queueLength("b")).to.equal(1);
    releaseA();
    releaseB();
  });

  it("ignores a second release", async function () {
    const lock = new KeyedLock();
    const release = await lock.acquire("a");
    const waiter = lock.acquire("a");
    release();
    release();
    const releaseWaiter = await waiter;
    expect(lock.queueLength("a")).to.equal(1);
    releaseWaiter();
  });
});

describe("PromptPrefixCache", function () {
  const prompt = [1, 2, 3, 4];

  it("measures the common prefix", function () {
    expect(commonPrefixLength([1, 2, 3], [1, 2, 9])).to.equal(2);
    expect(commonPrefixLength([], [1])).to.equal(0);
  });

  it("reports 0, then a reused prefix, then 0 after divergence", async function () {
    const backend = new ScriptedBackend();
    const cache = new PromptPrefixCache();

    const first = await cache.acquire(backend, "m", prompt);
    expect(first.cachedTokens).to.equal(0);
    first.release();

    const repeat = await cache.acquire(backend, "m", [...prompt, 5, 6]);
    expect(repeat.cachedTokens).to.equal(4);
    expect(repeat.handle).to.equal(first.handle);
    repeat.release();

    const diverged = await cache.acquire(backend, "m", [1, 2, 7]);
    expect(diverged.cachedTokens).to.equal(0);
    expect(backend.invalidated).to.deep.equal([first.handle]);
    expect(diverged.handle).to.not.equal(first.handle);
    diverged.release();

    expect(backend.log).to.deep.equal(["allocate:m", "invalidate:m", "allocate:m"]);
  });

  it("treats a shorter prompt as divergence", async function () {
    const backend = new ScriptedBackend();
    const cache = new PromptPrefixCache();
    (await cache.acquire(backend, "m", prompt)).release();
    const shorter = await cache.acquire(backend, "m", [1, 2]);
    expect(shorter.cachedTokens).to.equal(0);
    expect(backend.invalidated).to.have.length(1);
    shorter.release();
  });

  it("evicts other models of the same backend", async function () {
    const backend = new ScriptedBackend();
    const other = new ScriptedBackend({ id: "native", kind: "native" });
    const cache = new PromptPrefixCache();

    (await cache.acquire(backend, "a", prompt)).release();
    (await cache.acquire(other, "a", prompt)).release();
    (await cache.acquire(backend, "b", prompt)).release();

    expect(backend.invalidated.map((handle) => handle.model)).to.deep.equal(["a"]);

    const sameModel = await cache.acquire(backend, "b", prompt);
    expect(sameModel.cachedTokens).to.equal(4);
    sameModel.release();
    const otherBackend = await cache.acquire(other, "a", prompt);
    expect(otherBackend.cachedTokens).to.equal(4);
    otherBackend.release();
    const evicted = await cache.acquire(backend, "a", prompt);
    expect(evicted.cachedTokens).to.equal(0);
    evicted.release();
  });

  it("drops the entry when a lease is invalidated", async function () {
    const backend = new ScriptedBackend();
    const cache = new PromptPrefixCache();
    const lease = await cache.acquire(backend, "m", prompt);
    await lease.invalidate();
    lease.release();

    const next = await cache.acquire(backend, "m", prompt);
    expect(next.cachedTokens).to.equal(0);
    next.release();
  });

  it("serializes leases on one backend", async function () {
    const backend = new ScriptedBackend();
    const cache = new PromptPrefixCache();
    const first = await cache.acquire(backend, "m", prompt);

    let secondGranted = false;
    const second = cache.acquire(backend, "m", prompt).then((lease) => { secondGranted = true; return lease; });
    await new Promise((resolve) => setImmediate(resolve));
    expect(secondGranted).to.equal(false);

    first.release();
    const lease = await second;
    expect(lease.cachedTokens).to.equal(4);
    lease.release();
  });
});
