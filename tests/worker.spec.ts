import { expect } from "chai";
import path from "path";
import { ConfigurationError } from "../src/types/errors.js";
import { createLogger, silentLogger } from "../src/utils/logger.js";
import { TaskQueue } from "../src/workers/task-queue.js";
import type { ValidatedEvent, ValidatorOptions } from "../src/workers/types.js";
import { Worker } from "../src/workers/worker.js";
import { FakeValidator, makeTempDir, removeDir, tick } from "./support/fixtures.js";

describe("Worker", function () {
  it("validates every item and records only the failures", async function () {
    const queue = new TaskQueue<string>();
    const validator = new FakeValidator({
      "b.cr2": { ok: false, diagnostic: "corrupt header", exitCode: 1 },
    });
    const worker = new Worker("worker-1", queue, {
      validatorPath: "/usr/bin/dcraw_emu",
      logger: silentLogger,
      createValidator: () => validator,
    });

    queue.push("/photos/a.cr2");
    queue.push("/photos/b.cr2");
    queue.push("/photos/c.cr2");
    queue.markComplete();

    const result = await worker.run();

    expect(validator.calls).to.deep.equal([
      "/photos/a.cr2",
      "/photos/b.cr2",
      "/photos/c.cr2",
    ]);
    expect(result.workerId).to.equal("worker-1");
    expect(result.filesProcessed).to.equal(3);
    expect(result.filesFailed).to.equal(1);
    expect([...result.failures]).to.deep.equal([
      ["/photos/b.cr2", "corrupt header"],
    ]);
    expect(worker.failures).to.equal(result.failures);
  });

  it("records a throwing validator as a failure and keeps going", async function () {
    const queue = new TaskQueue<string>();
    const validator = new FakeValidator({
      "boom.dng": new Error("spawn EACCES"),
    });
    const worker = new Worker("worker-2", queue, {
      validatorPath: "/usr/bin/dcraw_emu",
      logger: silentLogger,
      createValidator: () => validator,
    });

    queue.push("/photos/boom.dng");
    queue.push("/photos/fine.dng");
    queue.markComplete();

    const result = await worker.run();

    expect(result.filesProcessed).to.equal(2);
    expect(Object.fromEntries(result.failures)).to.deep.equal({
      "/photos/boom.dng": "spawn EACCES",
    });
  });

  it("waits for work until the queue is marked complete", async function () {
    const queue = new TaskQueue<string>();
    const validator = new FakeValidator();
    const worker = new Worker("worker-1", queue, {
      validatorPath: "/usr/bin/dcraw_emu",
      logger: silentLogger,
      createValidator: () => validator,
    });

    let finished = false;
    const running = worker.run().then((result) => {
      finished = true;
      return result;
    });

    await tick();
    expect(finished).to.equal(false);
    expect(queue.waiting).to.equal(1);

    queue.push("/photos/late.raf");
    await tick();
    await tick();
    expect(finished).to.equal(false);

    queue.markComplete();
    const result = await running;

    expect(finished).to.equal(true);
    expect(result.filesProcessed).to.equal(1);
    expect(validator.calls).to.deep.equal(["/photos/late.raf"]);
  });

  it("reports each validated file", async function () {
    const queue = new TaskQueue<string>();
    const events: ValidatedEvent[] = [];
    const worker = new Worker("worker-3", queue, {
      validatorPath: "/usr/bin/dcraw_emu",
      logger: silentLogger,
      createValidator: () =>
        new FakeValidator({
          "bad.rw2": { ok: false, diagnostic: "truncated", exitCode: 1 },
        }),
      onValidated: (event) => events.push(event),
    });

    queue.push("/photos/good.rw2");
    queue.push("/photos/bad.rw2");
    queue.markComplete();
    await worker.run();

    expect(events).to.deep.equal([
      { workerId: "worker-3", filePath: "/photos/good.rw2", ok: true },
      { workerId: "worker-3", filePath: "/photos/bad.rw2", ok: false },
    ]);
  });

  it("keeps validating when the listener throws", async function () {
    const queue = new TaskQueue<string>();
    const warnings: unknown[][] = [];
    const worker = new Worker("worker-2", queue, {
      validatorPath: "/usr/bin/dcraw_emu",
      logger: createLogger({
        sink: {
          log: () => {},
          warn: (...args) => warnings.push(args),
          error: () => {},
        },
      }),
      createValidator: () =>
        new FakeValidator({
          "bad.cr3": { ok: false, diagnostic: "corrupt header", exitCode: 1 },
        }),
      onValidated: () => {
        throw new Error("listener exploded");
      },
    });

    queue.push("/photos/bad.cr3");
    queue.push("/photos/good.cr3");
    queue.markComplete();
    const result = await worker.run();

    expect(result.filesProcessed).to.equal(2);
    expect(Object.fromEntries(result.failures)).to.deep.equal({
      "/photos/bad.cr3": "corrupt header",
    });
    expect(warnings).to.have.length(2);
    expect(String(warnings[0][0])).to.include("listener exploded");
  });

  it("passes the decoder path and timeout to the validator factory", function () {
    const seen: Array<[string, ValidatorOptions]> = [];
    new Worker("worker-1", new TaskQueue<string>(), {
      validatorPath: "/opt/libraw/dcraw_emu",
      logger: silentLogger,
      timeoutMs: 2500,
      createValidator: (validatorPath, options) => {
        seen.push([validatorPath, options]);
        return new FakeValidator();
      },
    });

    expect(seen).to.deep.equal([["/opt/libraw/dcraw_emu", { timeoutMs: 2500 }]]);
  });

  it("fails fast when the decoder executable is missing", function () {
    const tempDir = makeTempDir();
    const missing = path.join(tempDir, "dcraw_emu");
    try {
      expect(
        () =>
          new Worker("worker-1", new TaskQueue<string>(), {
            validatorPath: missing,
            logger: silentLogger,
          }),
      ).to.throw(ConfigurationError, `Executable '${missing}' not found`);
    } finally {
      removeDir(tempDir);
    }
  });
});
