import { CommandResult, CommandRunner } from "./commandRunner";
import { DockerCli } from "./ContainerBuilder";
import { createMockLogger } from "./testUtils";

const ok: CommandResult = { ok: true, stdout: "", stderr: "", exitCode: 0 };

const setup = (result: CommandResult = ok) => {
  const runner = jest.fn<ReturnType<CommandRunner>, Parameters<CommandRunner>>();
  runner.mockResolvedValue(result);
  return { runner, docker: new DockerCli({ logger: createMockLogger(), runner }) };
};

describe("DockerCli", () => {
  it("should build a target stage with an explicit Dockerfile", async () => {
    const { runner, docker } = setup();

    await docker.build({
      tag: "app:worker-1.2.3",
      context: ".",
      dockerfile: "Dockerfile",
      target: "worker",
    });

    expect(runner).toHaveBeenCalledWith("docker", [
      "build",
      "-f",
      "Dockerfile",
      "-t",
      "app:worker-1.2.3",
      "--target",
      "worker",
      ".",
    ]);
  });

  it("should log in with the password on stdin", async () => {
    const { runner, docker } = setup();

    await docker.login("registry.example.test", "test-user", "test-secret");

    expect(runner).toHaveBeenCalledWith(
      "docker",
      ["login", "registry.example.test", "--username", "test-user", "--password-stdin"],
      { input: "test-secret" },
    );
  });

  it("should tag and push references", async () => {
    const { runner, docker } = setup();

    await docker.tag("app:1.2.3", "registry.example.test/app:1.2.3");
    await docker.push("registry.example.test/app:1.2.3");

    expect(runner.mock.calls.map(([, args]) => args.join(" "))).toEqual([
      "tag app:1.2.3 registry.example.test/app:1.2.3",
      "push registry.example.test/app:1.2.3",
    ]);
  });

  it("should fail with the end of the command output", async () => {
    const { docker } = setup({
      ok: false,
      stdout: "step 1/5\nstep 2/5\n",
      stderr: "ERROR: failed to solve: process did not complete successfully",
      error: "Command failed",
      exitCode: 1,
    });

    await expect(docker.push("registry.example.test/app:1.2.3")).rejects.toThrow(
      "docker push registry.example.test/app:1.2.3 failed: ERROR: failed to solve: process did not complete successfully\nstep 1/5\nstep 2/5",
    );
  });
});
