import { metrics } from "../../utils/metrics";
import { logger } from "../../utils/logger";

describe("Metrics Collector", () => {
  afterEach(() => {
    metrics.shutdown();
    jest.restoreAllMocks();
  });

  it("summarizes recorded values by name", () => {
    jest.spyOn(logger, "info").mockImplementation(() => undefined);
    metrics.flush();

    metrics.increment("scheduling.generated");
    metrics.increment("scheduling.generated");
    metrics.timing("scheduling.generate", 12);
    metrics.gauge("scheduling.queue", 4);

    expect(metrics.summarize()).toEqual([
      { name: "scheduling.generated", count: 2, total: 2 },
      { name: "scheduling.generate.duration", count: 1, total: 12 },
      { name: "scheduling.queue.gauge", count: 1, total: 4 },
    ]);
  });

  it("logs and clears the buffer on flush", () => {
    const infoSpy = jest.spyOn(logger, "info").mockImplementation(() => undefined);
    metrics.flush();
    infoSpy.mockClear();

    metrics.increment("scheduling.rejected");
    metrics.flush();

    expect(infoSpy).toHaveBeenCalledWith("Flushing metrics", {
      count: 1,
      summary: [{ name: "scheduling.rejected", count: 1, total: 1 }],
    });
    expect(metrics.summarize()).toEqual([]);
  });
});
