import { parseDurationSeconds, submitTask } from "../../src/application/submit-task/submitTask.usecase";
import { InvalidTaskRequestError } from "../../src/core/scaling/scaling.errors";
import type { TaskDoc } from "../../src/core/tasks/task.types";

const config = { defaultQueueName: "queue1", maxDurationSeconds: 60 };

describe("submitTask", () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it("enqueues a sleep task on the default queue", async () => {
    const enqueued: TaskDoc[] = [];
    const submitter = { enqueue: jest.fn(async (doc: TaskDoc) => void enqueued.push(doc)) };
    const createdAt = new Date("2026-03-01T12:00:00.000Z");

    const result = await submitTask({
      submitter,
      config,
      durationParam: "15",
      now: () => createdAt,
      newId: () => "task-1"
    });

    expect(result).toEqual({ taskId: "task-1", queueName: "queue1", durationSeconds: 15 });
    expect(enqueued).toEqual([
      {
        _id: "task-1",
        queueName: "queue1",
        name: "sleep",
        status: "ENQUEUED",
        input: { durationSeconds: 15 },
        createdAt,
        updatedAt: createdAt
      }
    ]);
    expect(logSpy).toHaveBeenCalledWith(
      JSON.stringify({ event: "task.enqueued", taskId: "task-1", queueName: "queue1", durationSeconds: 15 })
    );
  });

  it("targets an explicit queue", async () => {
    const enqueue = jest.fn().mockResolvedValue(undefined);

    const result = await submitTask({ submitter: { enqueue }, config, durationParam: "0", queueName: " reports " });

    expect(result.queueName).toBe("reports");
    expect(enqueue).toHaveBeenCalledWith(expect.objectContaining({ queueName: "reports", input: { durationSeconds: 0 } }));
  });

  it("falls back to the default queue for a blank name", async () => {
    const enqueue = jest.fn().mockResolvedValue(undefined);

    const result = await submitTask({ submitter: { enqueue }, config, durationParam: "1", queueName: "  " });

    expect(result.queueName).toBe("queue1");
  });

  it("does not enqueue when the duration is invalid", async () => {
    const enqueue = jest.fn();

    await expect(submitTask({ submitter: { enqueue }, config, durationParam: "abc" })).rejects.toBeInstanceOf(
      InvalidTaskRequestError
    );
    expect(enqueue).not.toHaveBeenCalled();
  });

  it("propagates submitter failures", async () => {
    const enqueue = jest.fn().mockRejectedValue(new Error("write failed"));

    await expect(submitTask({ submitter: { enqueue }, config, durationParam: "5" })).rejects.toThrow("write failed");
    expect(logSpy).not.toHaveBeenCalled();
  });
});

describe("parseDurationSeconds", () => {
  it("accepts integers within the cap", () => {
    expect(parseDurationSeconds("0", 60)).toBe(0);
    expect(parseDurationSeconds("60", 60)).toBe(60);
    expect(parseDurationSeconds(" 7 ", 60)).toBe(7);
  });

  it.each([
    { raw: "-1", message: 'Invalid duration: "-1" is not a non-negative integer' },
    { raw: "1.5", message: 'Invalid duration: "1.5" is not a non-negative integer' },
    { raw: "", message: 'Invalid duration: "" is not a non-negative integer' },
    { raw: "61", message: "Invalid duration: 61 exceeds 60 seconds" }
  ])("rejects $raw", ({ raw, message }) => {
    expect(() => parseDurationSeconds(raw, 60)).toThrow(message);
  });
});
