import { outputTail } from "./commandRunner";

describe("outputTail", () => {
  const failed = { ok: false, stdout: "", stderr: "", exitCode: 1 };

  it("should keep the last lines of stderr then stdout", () => {
    expect(
      outputTail({ ...failed, stderr: "a\nb\nc", stdout: "d\n" }, 2),
    ).toBe("c\nd");
  });

  it("should fall back to the error, then the exit code", () => {
    expect(outputTail({ ...failed, error: "spawn gh ENOENT" })).toBe(
      "spawn gh ENOENT",
    );
    expect(outputTail(failed)).toBe("exit code 1");
  });
});
