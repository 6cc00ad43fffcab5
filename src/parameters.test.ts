import {
  createParameterCatalog,
  isRequired,
  KEYS,
  secretKeys,
} from "./parameters";

const catalog = createParameterCatalog({
  appName: "app",
  localRegistry: "localhost:5000",
});

const find = (key: string) => {
  const parameter = catalog.find((p) => p.key === key);
  if (!parameter) {
    throw new Error(`No parameter ${key}`);
  }
  return parameter;
};

describe("createParameterCatalog", () => {
  it("should list every key once", () => {
    const keys = catalog.map((p) => p.key);

    expect(new Set(keys).size).toBe(keys.length);
    expect(keys).toEqual(expect.arrayContaining(Object.values(KEYS)));
  });

  it("should mark credentials as secret", () => {
    expect([...secretKeys(catalog)].sort()).toEqual([
      "ARGOCD_TOKEN",
      "DOCKER_REGISTRY_PASSWORD",
      "GITHUB_PAT",
      "REDIS_PASSWORD",
    ]);
  });

  it("should only require registry credentials for a remote registry", () => {
    const user = find(KEYS.registryUser);

    expect(isRequired(user, { DOCKER_REGISTRY: "ghcr.io" })).toBe(true);
    expect(isRequired(user, { DOCKER_REGISTRY: "local" })).toBe(false);
    expect(isRequired(user, { DOCKER_REGISTRY: "localhost:5000" })).toBe(false);
  });

  it("should derive registry credentials from GitHub for ghcr.io only", () => {
    const password = find(KEYS.registryPassword);
    const values = { GITHUB_PAT: "test-secret", DOCKER_REGISTRY: "ghcr.io" };

    expect(password.derive?.(values)).toBe("test-secret");
    expect(
      password.derive?.({ ...values, DOCKER_REGISTRY: "registry.example.test" }),
    ).toBeUndefined();
  });

  it("should generate a fresh redis password each time", () => {
    const generate = find(KEYS.redisPassword).generate;
    const first = generate?.();

    expect(first).toHaveLength(44);
    expect(generate?.()).not.toBe(first);
  });
});
