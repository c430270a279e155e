import { HeartbeatService } from "../../src/services/heartbeat.service";
import { sleep } from "../helpers/poll";

describe("HeartbeatService", () => {
  let sink: { recordHeartbeat: jest.Mock };
  let heartbeat: HeartbeatService;

  beforeEach(() => {
    sink = {
      recordHeartbeat: jest.fn().mockResolvedValue(undefined),
    };
    heartbeat = new HeartbeatService(sink, 50); // 50ms interval
  });

  afterEach(() => {
    heartbeat.stopAll();
  });

  it("beats immediately and then on the interval", async () => {
    heartbeat.start("worker-1");
    expect(heartbeat.isRunning("worker-1")).toBe(true);
    await sleep(130); // first tick plus ~2 more
    expect(sink.recordHeartbeat).toHaveBeenCalledWith("worker-1");
    expect(sink.recordHeartbeat.mock.calls.length).toBeGreaterThanOrEqual(2);

    heartbeat.stop("worker-1");
    expect(heartbeat.isRunning("worker-1")).toBe(false);
  });

  it("supports multiple concurrent workers", async () => {
    heartbeat.start("worker-1");
    heartbeat.start("worker-2");
    await sleep(75);

    expect(sink.recordHeartbeat).toHaveBeenCalledWith("worker-1");
    expect(sink.recordHeartbeat).toHaveBeenCalledWith("worker-2");

    heartbeat.stop("worker-1");
    await sleep(10);

    // worker-1 stops, worker-2 continues
    sink.recordHeartbeat.mockClear();
    await sleep(120);
    expect(sink.recordHeartbeat).not.toHaveBeenCalledWith("worker-1");
    expect(sink.recordHeartbeat).toHaveBeenCalledWith("worker-2");
  });

  it("stopAll stops everything", async () => {
    heartbeat.start("w1");
    heartbeat.start("w2");
    heartbeat.stopAll();
    expect(heartbeat.size).toBe(0);

    await sleep(10);
    sink.recordHeartbeat.mockClear();
    await sleep(100);
    expect(sink.recordHeartbeat).not.toHaveBeenCalled();
  });

  it("keeps ticking when the sink throws", async () => {
    const failing = { recordHeartbeat: jest.fn().mockRejectedValue(new Error("sink down")) };
    const errors = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const service = new HeartbeatService(failing, 20);

    service.start("w1");
    await sleep(70);
    service.stopAll();

    expect(failing.recordHeartbeat.mock.calls.length).toBeGreaterThanOrEqual(2);
    expect(errors).toHaveBeenCalled();
    errors.mockRestore();
  });
});
