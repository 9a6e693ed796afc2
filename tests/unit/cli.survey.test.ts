import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";

describe("survey replay CLI", () => {
  afterEach(() => {
    jest.resetModules();
    jest.restoreAllMocks();
  });

  it("spaces untimed track points by the step", async () => {
    const { trackToFixes } = await import("../../src/cli/survey");

    const fixes = trackToFixes(
      [
        { latitude: 1, longitude: 1 },
        { latitude: 2, longitude: 2 },
        { latitude: 3, longitude: 3, time: new Date(100000) },
        { latitude: 4, longitude: 4 }
      ],
      5000,
      1000
    );

    expect(fixes.map((fix) => fix.timestampMillis)).toEqual([1000, 6000, 100000, 105000]);
    expect(fixes[0]).toEqual({ latitude: 1, longitude: 1, timestampMillis: 1000 });
  });

  it("replays the track points of a GPX file", async () => {
    const runSurveyReplay = jest.fn().mockResolvedValue({ fixes: 2, accepted: 2, notifications: 0 });
    jest.doMock("../../src/composition/root", () => ({ runSurveyReplay }));

    const dir = await mkdtemp(path.join(os.tmpdir(), "survey-cli-"));
    try {
      const file = path.join(dir, "track.gpx");
      await writeFile(
        file,
        `<gpx><trk><trkseg>
          <trkpt lat="1" lon="1"><time>2026-04-01T08:00:00Z</time></trkpt>
          <trkpt lat="1.001" lon="1"><time>2026-04-01T08:00:30Z</time></trkpt>
        </trkseg></trk></gpx>`,
        "utf8"
      );

      const { executeSurveyCli } = await import("../../src/cli/survey");
      await executeSurveyCli([file, "--reset"]);

      expect(runSurveyReplay).toHaveBeenCalledWith(
        [
          { latitude: 1, longitude: 1, timestampMillis: Date.parse("2026-04-01T08:00:00Z") },
          { latitude: 1.001, longitude: 1, timestampMillis: Date.parse("2026-04-01T08:00:30Z") }
        ],
        { reset: true }
      );
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("exits with code 1 on a bad step flag", async () => {
    jest.doMock("../../src/composition/root", () => ({ runSurveyReplay: jest.fn() }));
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

    const { executeSurveyCli } = await import("../../src/cli/survey");
    await expect(executeSurveyCli(["track.gpx", "--step-ms=fast"])).rejects.toThrow("EXIT:1");

    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0]))).toMatchObject({
      event: "survey.failed",
      message: "--step-ms must be an integer >= 0\nusage: survey-replay <track.gpx> [--reset] [--step-ms=<ms>]"
    });
  });
});
