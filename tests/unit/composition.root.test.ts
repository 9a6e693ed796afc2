import { makePoi, TORONTO } from "../support/fakes";

describe("composition root", () => {
  const envSnapshot = { ...process.env };

  afterEach(() => {
    process.env = { ...envSnapshot };
    jest.resetModules();
    jest.restoreAllMocks();
  });

  const mockEnv = () => {
    const loadEnv = jest.fn().mockReturnValue({
      MONGO_URI: "mongodb://localhost:27017/survey-test",
      OVERPASS_BASE_URL: "http://127.0.0.1:3999/api/interpreter"
    });
    jest.doMock("../../src/shared/config/env", () => ({ loadEnv }));
    return loadEnv;
  };

  it("wires dependencies and closes the repository after an import", async () => {
    process.env = { ...envSnapshot, OVERPASS_TIMEOUT_MS: "1200", OVERPASS_RETRIES: "2", IMPORT_CONCURRENCY: "4" };

    const close = jest.fn().mockResolvedValue(undefined);
    const repo = { close };
    const client = {};
    const importPois = jest.fn().mockResolvedValue({ requests: 0 });
    const mongoCtor = jest.fn().mockImplementation(() => repo);
    const httpCtor = jest.fn().mockImplementation(() => client);
    const loadEnv = mockEnv();

    jest.doMock("../../src/application/import-pois/importPois.usecase", () => ({ importPois }));
    jest.doMock("../../src/infrastructure/mongo/MongoPoiRepository", () => ({ MongoPoiRepository: mongoCtor }));
    jest.doMock("../../src/infrastructure/overpass/OverpassHttpClient", () => ({ OverpassHttpClient: httpCtor }));

    const { runImport } = await import("../../src/composition/root");
    const requests = [{ kind: "manual" as const, entries: [] }];
    await runImport(requests, { replaceExisting: true });

    expect(loadEnv).toHaveBeenCalledTimes(1);
    expect(httpCtor).toHaveBeenCalledWith("http://127.0.0.1:3999/api/interpreter", 1200, 2);
    expect(mongoCtor).toHaveBeenCalledWith("mongodb://localhost:27017/survey-test");
    expect(importPois).toHaveBeenCalledWith(
      {
        repo,
        overpass: client,
        registry: expect.anything(),
        config: { concurrency: 4, overpassRadiusMeters: 1000, replaceExisting: true }
      },
      requests
    );
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("closes the repository when the import fails", async () => {
    const close = jest.fn().mockResolvedValue(undefined);
    const importPois = jest.fn().mockRejectedValue(new Error("boom"));
    mockEnv();

    jest.doMock("../../src/application/import-pois/importPois.usecase", () => ({ importPois }));
    jest.doMock("../../src/infrastructure/mongo/MongoPoiRepository", () => ({
      MongoPoiRepository: jest.fn().mockImplementation(() => ({ close }))
    }));

    const { runImport } = await import("../../src/composition/root");
    await expect(runImport([])).rejects.toThrow("boom");
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("replays fixes against the stored POIs", async () => {
    const logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    const stored = makePoi({ id: "manual_pin", name: "Pin" });
    const repo = {
      queryAll: jest.fn().mockResolvedValue([stored]),
      updateLastNotifiedAt: jest.fn().mockResolvedValue(undefined),
      markVisited: jest.fn().mockResolvedValue(undefined),
      clearSurveyState: jest.fn().mockResolvedValue(undefined),
      close: jest.fn().mockResolvedValue(undefined)
    };
    mockEnv();
    jest.doMock("../../src/infrastructure/mongo/MongoPoiRepository", () => ({
      MongoPoiRepository: jest.fn().mockImplementation(() => repo)
    }));

    const { runSurveyReplay } = await import("../../src/composition/root");
    const summary = await runSurveyReplay(
      [
        { ...TORONTO, timestampMillis: 0 },
        { ...TORONTO, timestampMillis: 1000 }
      ],
      { reset: true }
    );

    expect(summary).toEqual({ fixes: 2, accepted: 1, notifications: 1 });
    expect(repo.clearSurveyState).toHaveBeenCalledTimes(1);
    expect(repo.updateLastNotifiedAt).toHaveBeenCalledWith("manual_pin", 0);
    expect(repo.close).toHaveBeenCalledTimes(1);

    const events = logSpy.mock.calls.map((call) => JSON.parse(String(call[0])).event);
    expect(events).toEqual(["survey.notification", "proximity.fired", "survey.replay_completed"]);
  });
});
