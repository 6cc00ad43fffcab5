import { EventEmitter } from "events";
import { CleanupScope, closeOnSignals, INTERRUPTED_EXIT_CODE, withCleanup } from "./cleanup";
import { createMockLogger } from "./testUtils";

describe("CleanupScope", () => {
  it("should run actions newest first", async () => {
    const order: string[] = [];
    const scope = new CleanupScope(createMockLogger());
    scope.register("first", () => {
      order.push("first");
    });
    scope.register("second", async () => {
      order.push("second");
    });

    await scope.close();

    expect(order).toEqual(["second", "first"]);
    expect(scope.size).toBe(0);
  });

  it("should keep going when an action fails", async () => {
    const logger = createMockLogger();
    const closed: string[] = [];
    const scope = new CleanupScope(logger);
    scope.register("port-forward", () => {
      closed.push("port-forward");
    });
    scope.register("session", () => {
      throw new Error("socket hang up");
    });

    await scope.close();

    expect(closed).toEqual(["port-forward"]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Failed to close session: Error: socket hang up",
    );
  });

  it("should run actions once when closed twice", async () => {
    const action = jest.fn();
    const scope = new CleanupScope(createMockLogger());
    scope.register("forward", action);

    await Promise.all([scope.close(), scope.close()]);

    expect(action).toHaveBeenCalledTimes(1);
  });

  it("should refuse registrations after close", async () => {
    const scope = new CleanupScope(createMockLogger());
    await scope.close();

    expect(() => scope.register("late", jest.fn())).toThrow(
      'Cannot register "late": cleanup already started',
    );
  });
});

describe("withCleanup", () => {
  it("should close the scope when the body throws", async () => {
    const action = jest.fn();

    await expect(
      withCleanup(createMockLogger(), async (scope) => {
        scope.register("forward", action);
        throw new Error("authentication failed");
      }),
    ).rejects.toThrow("authentication failed");

    expect(action).toHaveBeenCalledTimes(1);
  });

  it("should return the body's value", async () => {
    await expect(withCleanup(createMockLogger(), async () => 42)).resolves.toBe(42);
  });
});

describe("closeOnSignals", () => {
  it("should close the scope and exit on SIGINT", async () => {
    const target = new EventEmitter();
    const scope = new CleanupScope(createMockLogger());
    const action = jest.fn();
    scope.register("forward", action);
    const exited = new Promise<number>((resolve) => {
      closeOnSignals(scope, createMockLogger(), resolve, target);
    });

    target.emit("SIGINT", "SIGINT");

    await expect(exited).resolves.toBe(INTERRUPTED_EXIT_CODE);
    expect(action).toHaveBeenCalledTimes(1);
  });

  it("should remove its handlers when released", () => {
    const target = new EventEmitter();
    const release = closeOnSignals(
      new CleanupScope(createMockLogger()),
      createMockLogger(),
      jest.fn(),
      target,
    );

    expect(target.listenerCount("SIGTERM")).toBe(1);
    release();
    expect(target.listenerCount("SIGINT")).toBe(0);
    expect(target.listenerCount("SIGTERM")).toBe(0);
  });
});
