describe("composition root", () => {
  const envSnapshot = { ...process.env };

  afterEach(() => {
    process.env = { ...envSnapshot };
    jest.resetModules();
    jest.restoreAllMocks();
  });

  const mockAdapters = () => {
    const close = jest.fn().mockResolvedValue(undefined);
    const tasks = { close, countNonTerminalByQueue: jest.fn(), enqueue: jest.fn() };
    const metadata = { listQueues: jest.fn() };
    const mongoCtor = jest.fn().mockImplementation(() => tasks);
    const httpCtor = jest.fn().mockImplementation(() => metadata);

    jest.doMock("../../src/infrastructure/mongo/MongoTaskRepository", () => ({ MongoTaskRepository: mongoCtor }));
    jest.doMock("../../src/infrastructure/queue-admin/QueueMetadataHttpClient", () => ({
      QueueMetadataHttpClient: httpCtor
    }));

    return { close, tasks, metadata, mongoCtor, httpCtor };
  };

  it("wires adapters from env defaults", async () => {
    const { tasks, mongoCtor, httpCtor } = mockAdapters();

    const { createScalerApp } = await import("../../src/composition/root");
    const app = createScalerApp({});

    expect(httpCtor).toHaveBeenCalledWith("http://localhost:3001", 5000, "/dbos-workflow-queues-metadata");
    expect(mongoCtor).toHaveBeenCalledWith("mongodb://localhost:27017/scaler", 5000);
    expect(app.submitter).toBe(tasks);
    expect(app.runtime.port).toBe(8000);
  });

  it("applies path and timeout overrides from env", async () => {
    const { mongoCtor, httpCtor } = mockAdapters();

    const { createScalerApp } = await import("../../src/composition/root");
    createScalerApp({
      MONGO_URI: "mongodb://db:27017/scaler",
      QUEUE_ADMIN_URL: "http://workflows:3001",
      QUEUE_METADATA_PATH: "admin/queues",
      ADMIN_TIMEOUT_MS: "1200",
      BACKLOG_TIMEOUT_MS: "2500"
    });

    expect(httpCtor).toHaveBeenCalledWith("http://workflows:3001", 1200, "/admin/queues");
    expect(mongoCtor).toHaveBeenCalledWith("mongodb://db:27017/scaler", 2500);
  });

  it("runs one poll and closes the backend connection", async () => {
    process.env = { ...envSnapshot };
    const { close } = mockAdapters();
    const pollScaling = jest.fn().mockResolvedValue({ expectedWorkers: 3 });
    jest.doMock("../../src/application/poll-scaling/pollScaling.usecase", () => ({ pollScaling }));

    const { runPoll } = await import("../../src/composition/root");
    await expect(runPoll()).resolves.toEqual({ expectedWorkers: 3 });

    expect(pollScaling).toHaveBeenCalledTimes(1);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("closes the backend connection when the poll fails", async () => {
    process.env = { ...envSnapshot };
    const { close } = mockAdapters();
    jest.doMock("../../src/application/poll-scaling/pollScaling.usecase", () => ({
      pollScaling: jest.fn().mockRejectedValue(new Error("poll failed"))
    }));

    const { runPoll } = await import("../../src/composition/root");
    await expect(runPoll()).rejects.toThrow("poll failed");
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("fails fast when runtime caps are violated", async () => {
    mockAdapters();

    const { createScalerApp } = await import("../../src/composition/root");
    expect(() => createScalerApp({ ADMIN_TIMEOUT_MS: "999999" })).toThrow(
      "ADMIN_TIMEOUT_MS=999999 is out of allowed range [100..30000]"
    );
  });
});
