import { ConfigReader } from "@backstage/config";
import { CliArgs, parseCliArgs, runCli, Runtime, USAGE, UsageError } from "./cli";
import { readBootstrapOptions } from "./config";
import { MemoryConfigStore } from "./configStore";
import { NonInteractiveInputProvider } from "./inputProvider";
import { ManifestObject } from "./manifests";
import {
  createMockLogger,
  FakeClusterClient,
  FakeContainerBuilder,
  FakeGitOpsController,
  FakeSourceControl,
  ManualClock,
  workloadStatus,
} from "./testUtils";

describe("parseCliArgs", () => {
  it("should parse provision with a step selection", () => {
    expect(
      parseCliArgs(["provision", "--only", "generate-token, propagate-secrets", "--non-interactive"]),
    ).toMatchObject({
      command: "provision",
      interactive: false,
      logLevel: "info",
      only: ["generate-token", "propagate-secrets"],
    });
  });

  it("should return undefined for --help", () => {
    expect(parseCliArgs(["check", "--help"])).toBeUndefined();
  });

  it("should parse rollback ids", () => {
    expect(parseCliArgs(["rollback", "app", "--id", "3"])).toMatchObject({
      command: "rollback",
      application: "app",
      historyId: 3,
    });
  });

  const rejected: [string[], string][] = [
    [[], "Missing command"],
    [["bogus"], 'Unknown command "bogus"'],
    [["deploy"], "deploy needs --version"],
    [["history"], "history needs an application name"],
    [["check", "extra"], 'Unexpected argument "extra"'],
    [["rollback", "app", "--id=-1"], "rollback needs --id <history id>"],
    [["rollback", "app", "--id", "two"], "rollback needs --id <history id>"],
    [["check", "--log-level", "loud"], "--log-level must be one of error, warn, info, debug"],
  ];

  it.each(rejected)("should reject %j", (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(new UsageError(message));
  });

  it("should reject unknown options", () => {
    expect(() => parseCliArgs(["check", "--force"])).toThrow(UsageError);
  });
});

describe("runCli", () => {
  const setup = (store: Record<string, string> = {}) => {
    const logger = createMockLogger();
    const cluster = new FakeClusterClient();
    const sourceControl = new FakeSourceControl();
    const controller = new FakeGitOpsController();
    const printed: string[] = [];
    const errors: string[] = [];
    const manifests: Record<string, ManifestObject[]> = {
      "argocd/appproject.yaml": [
        { apiVersion: "argoproj.io/v1alpha1", kind: "AppProject", metadata: { name: "app" } },
      ],
      "argocd/application.yaml": [
        { apiVersion: "argoproj.io/v1alpha1", kind: "Application", metadata: { name: "app" } },
      ],
    };
    const runtime: Runtime = {
      logger,
      redact: jest.fn(),
      options: readBootstrapOptions(new ConfigReader({})),
      store: new MemoryConfigStore(store),
      cluster,
      sourceControl,
      builder: new FakeContainerBuilder(),
      input: new NonInteractiveInputProvider(),
      connect: jest.fn(() => controller),
      loadRemoteManifests: async () => [],
      loadManifests: async (file) => manifests[file] ?? [],
      print: (line) => printed.push(line),
      clock: new ManualClock(),
    };
    const factory = jest.fn((_args: CliArgs) => runtime);
    const run = (...argv: string[]) =>
      runCli(argv, factory, (line) => errors.push(line), (text) => printed.push(text));
    return { run, runtime, logger, cluster, sourceControl, controller, printed, errors };
  };

  const row = (key: string, value: string) =>
    `  ${key.padEnd("DOCKER_REGISTRY_PASSWORD".length)}  ${value}`;

  it("should print usage for --help", async () => {
    const { run, printed } = setup();

    await expect(run("--help")).resolves.toBe(0);
    expect(printed).toEqual([USAGE]);
  });

  it("should exit 1 on usage errors", async () => {
    const { run, errors } = setup();

    await expect(run("bogus")).resolves.toBe(1);
    expect(errors).toEqual(['Unknown command "bogus"', USAGE]);
  });

  it("should print the resolved configuration on check", async () => {
    const { run, printed } = setup({ GITHUB_PAT: "test-secret-pat" });

    await expect(run("check", "--non-interactive")).resolves.toBe(0);

    expect(printed).toContain("Configuration:");
    expect(printed).toContain(row("GITHUB_USERNAME", "test-user"));
    expect(printed).toContain(row("GITHUB_PAT", "SET"));
    expect(printed).toContain(row("K8S_STORAGE_CLASS", "NOT SET"));
    expect(printed).toContain(row("DOCKER_REGISTRY_USER", "test-user"));
    expect(printed).toContain(row("DOCKER_REGISTRY_PASSWORD", "SET"));
    expect(printed).toContain(row("APP_DOMAIN", "app.local"));
    expect(printed).toContain(row("ARGOCD_TOKEN", "NOT SET"));
    expect(printed).toContain("  - No default storage class found");
    expect(printed.join("\n")).not.toContain("test-secret-pat");
  });

  it("should exit 2 listing every missing key when it may not prompt", async () => {
    const { run, sourceControl, logger, errors } = setup();
    sourceControl.state = { authenticated: false };

    await expect(run("check", "--non-interactive")).resolves.toBe(2);

    expect(logger.error).toHaveBeenCalledWith(
      "Missing required configuration: GITHUB_USERNAME, GITHUB_PAT, DOCKER_REGISTRY_USER, DOCKER_REGISTRY_PASSWORD",
    );
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(/^Remediation: /);
  });

  it("should exit 2 when the cluster is unreachable", async () => {
    const { run, cluster } = setup({ GITHUB_PAT: "test-secret-pat" });
    cluster.reachable = false;

    await expect(run("check")).resolves.toBe(2);
  });

  it("should provision Argo CD end to end", async () => {
    const { run, cluster, controller, sourceControl, runtime, printed } = setup({
      GITHUB_PAT: "test-secret-pat",
    });
    cluster.namespaces.add("argocd");
    cluster.deployments.set("argocd/argocd-server", workloadStatus(true));
    cluster.secrets.set("argocd/argocd-initial-admin-secret", {
      password: "test-admin-password",
    });
    cluster.addPod("argocd", "argocd-server-0", {
      "app.kubernetes.io/name": "argocd-server",
    });

    await expect(run("provision", "--non-interactive")).resolves.toBe(0);

    expect(printed).toContain(`  ${"install-controller".padEnd(22)} skipped (already satisfied)`);
    expect(printed).toContain(`  ${"propagate-secrets".padEnd(22)} done`);
    expect(cluster.appliedNames()).toEqual(["AppProject/app", "Application/app"]);
    expect(cluster.forwards).toEqual([
      { pod: "argocd-server-0", localPort: 8080, closed: true },
    ]);
    expect(runtime.connect).toHaveBeenCalledWith("https://127.0.0.1:8080");
    expect(controller.repositories).toEqual([
      {
        url: "https://github.com/test-user/k8s-manifests",
        username: "test-user",
        password: "test-secret-pat",
      },
    ]);
    await expect(runtime.store.get("ARGOCD_TOKEN")).resolves.toBe("test-token-1");
    expect(sourceControl.created).toEqual(["test-user/app", "test-user/k8s-manifests"]);
    expect(sourceControl.secrets.get("test-user/app:ARGOCD_TOKEN")).toBe("test-token-1");
    expect(sourceControl.secrets.get("test-user/app:ARGOCD_SERVER")).toBe("localhost:8080");
    expect(sourceControl.secrets.get("test-user/app:ARGOCD_GITHUB_TOKEN")).toBe(
      "test-secret-pat",
    );
  });

  it("should exit 3 when a provisioning step fails", async () => {
    const { run, cluster, printed } = setup({ GITHUB_PAT: "test-secret-pat" });
    cluster.namespaces.add("argocd");
    cluster.deployments.set("argocd/argocd-server", workloadStatus(true));

    await expect(run("provision", "--only", "authenticate")).resolves.toBe(3);
    expect(printed).toContain(`  ${"authenticate".padEnd(22)} not started`);
  });

  describe("controller commands", () => {
    const stored = {
      ARGOCD_SERVER: "argocd.example.test",
      ARGOCD_TOKEN: "test-token",
    };

    it("should print application history", async () => {
      const { run, controller, printed, runtime } = setup(stored);
      controller.history.set("app", [
        {
          id: 3,
          revision: "abc123",
          deployedAt: "2024-05-01T10:00:00Z",
          initiatedBy: "admin",
        },
      ]);

      await expect(run("history", "app")).resolves.toBe(0);

      expect(runtime.connect).toHaveBeenCalledWith("argocd.example.test");
      expect(controller.tokensUsed).toEqual(["test-token"]);
      expect(printed).toEqual(["   3  abc123  2024-05-01T10:00:00Z  admin"]);
    });

    it("should sync through a port-forward to a local server", async () => {
      const { run, controller, cluster, printed } = setup({
        ...stored,
        ARGOCD_SERVER: "localhost:8080",
      });
      cluster.addPod("argocd", "argocd-server-0", {
        "app.kubernetes.io/name": "argocd-server",
      });

      await expect(run("sync", "app", "--revision", "def456")).resolves.toBe(0);

      expect(controller.syncs).toEqual([{ name: "app", revision: "def456" }]);
      expect(cluster.forwards[0].closed).toBe(true);
      expect(printed).toEqual(["Sync of app started at def456"]);
    });

    it("should roll back to a history entry", async () => {
      const { run, controller } = setup(stored);

      await expect(run("rollback", "app", "--id", "3")).resolves.toBe(0);

      expect(controller.rollbacks).toEqual([{ name: "app", id: 3 }]);
    });

    it("should exit 2 without a stored token", async () => {
      const { run, logger } = setup({ ARGOCD_SERVER: "argocd.example.test" });

      await expect(run("history", "app")).resolves.toBe(2);
      expect(logger.error).toHaveBeenCalledWith(
        "Missing required configuration: ARGOCD_TOKEN",
      );
    });
  });
});
