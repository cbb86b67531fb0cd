import { parseFakeQueues } from "../../src/fake-admin-server";

describe("parseFakeQueues", () => {
  it("reads name:concurrency pairs and uncapped names", () => {
    expect(parseFakeQueues("queue1:1, reports:5,,bulk")).toEqual([
      { name: "queue1", workerConcurrency: 1 },
      { name: "reports", workerConcurrency: 5 },
      { name: "bulk" }
    ]);
  });

  it("keeps negative values so the estimator can reject them", () => {
    expect(parseFakeQueues("broken:-1")).toEqual([{ name: "broken", workerConcurrency: -1 }]);
  });

  it.each(["queue1:abc", "queue1:1.5", "queue1:"])("rejects a non-integer concurrency: %s", (raw) => {
    expect(() => parseFakeQueues(raw)).toThrow(`FAKE_QUEUES entry "${raw}" must use an integer concurrency`);
  });
});
