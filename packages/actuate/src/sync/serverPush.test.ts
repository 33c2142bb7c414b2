import { describe, it, expect, vi } from "vitest";
import { store } from "../core/store";
import { MissingServerRevisionError } from "../errors";
import { serverPush } from "./serverPush";
import { stableSyncWithPush, type StableSyncContext } from "./stableSync";

interface LikeState {
  liked: boolean;
  revision?: number;
}

interface Push {
  liked: boolean;
  revision: number;
}

type Context = StableSyncContext<LikeState, [liked: boolean]>;

interface PendingRequest {
  value: boolean;
  context: Context;
  /** Reports the revision the server gave the value, then answers. */
  answer(revision: number, response?: unknown): void;
}

function fakeServer() {
  const requests: PendingRequest[] = [];
  const send = (value: boolean, context: Context) =>
    new Promise<unknown>((resolve) => {
      requests.push({
        value,
        context,
        answer(revision, response = null) {
          context.informServerRevision(revision);
          resolve(response);
        },
      });
    });
  return { requests, send };
}

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

const isPush = (value: unknown): value is Push =>
  typeof value === "object" && value !== null && "liked" in value && "revision" in value;

function setup(initial: LikeState, applyEvenIfLocked?: boolean) {
  const server = fakeServer();
  const applyServerResponseToState = vi.fn((state: LikeState, response: unknown) =>
    isPush(response) ? { ...state, liked: response.liked, revision: response.revision } : null
  );

  const setLiked = stableSyncWithPush<LikeState, [liked: boolean], boolean>({
    name: "setLiked",
    valueToApply: ({ args: [liked] }) => liked,
    applyOptimisticValueToState: (state, liked) => ({ ...state, liked }),
    getValueFromState: (state) => state.liked,
    getServerRevisionFromState: (state) => state.revision,
    sendValueToServer: server.send,
    applyServerResponseToState,
  });

  const likePushed = serverPush<LikeState, [push: Push]>({
    name: "likePushed",
    associatedAction: setLiked,
    applyEvenIfLocked,
    serverRevision: ({ args: [push] }) => push.revision,
    applyServerPushToState: (state, _key, revision, { args: [push] }) => ({
      ...state,
      liked: push.liked,
      revision,
    }),
    getServerRevisionFromState: (state) => state.revision,
  });

  const app = store<LikeState>({ state: initial });
  return { app, server, setLiked, likePushed, applyServerResponseToState };
}

describe("serverPush", () => {
  it("should apply newer pushes and ignore stale ones", () => {
    const { app, likePushed } = setup({ liked: false, revision: 5 });

    app.dispatchSync(likePushed({ liked: true, revision: 3 }));
    expect(app.state).toEqual({ liked: false, revision: 5 });

    app.dispatchSync(likePushed({ liked: true, revision: 6 }));
    expect(app.state).toEqual({ liked: true, revision: 6 });

    app.dispatchSync(likePushed({ liked: false, revision: 6 }));
    expect(app.state).toEqual({ liked: true, revision: 6 });
  });

  it("should apply a push while a request is in flight", async () => {
    const { app, server, setLiked, likePushed } = setup({ liked: false, revision: 1 });

    const sync = app.dispatchAndWait(setLiked(true));
    await flush();
    app.dispatchSync(likePushed({ liked: false, revision: 2 }));

    expect(app.state).toEqual({ liked: false, revision: 2 });
    server.requests[0].answer(3);
    await sync;
  });

  it("should skip a push while locked when asked to", async () => {
    const { app, server, setLiked, likePushed } = setup({ liked: false, revision: 1 }, false);

    const sync = app.dispatchAndWait(setLiked(true));
    await flush();
    app.dispatchSync(likePushed({ liked: false, revision: 2 }));

    expect(app.state).toEqual({ liked: true, revision: 1 });
    server.requests[0].answer(3);
    await sync;

    app.dispatchSync(likePushed({ liked: false, revision: 4 }));
    expect(app.state).toEqual({ liked: false, revision: 4 });
  });
});

describe("stableSyncWithPush", () => {
  it("should fail when the server revision is never reported", async () => {
    const onFinish = vi.fn(() => null);
    const app = store<LikeState>({ state: { liked: false } });
    const setLiked = stableSyncWithPush<LikeState, [liked: boolean], boolean>({
      name: "setLiked",
      valueToApply: ({ args: [liked] }) => liked,
      applyOptimisticValueToState: (state, liked) => ({ ...state, liked }),
      getValueFromState: (state) => state.liked,
      getServerRevisionFromState: (state) => state.revision,
      sendValueToServer: async () => null,
      onFinish,
    });

    await expect(app.dispatchAndWait(setLiked(true))).rejects.toBeInstanceOf(
      MissingServerRevisionError
    );
    expect(onFinish).toHaveBeenCalledWith(
      expect.any(MissingServerRevisionError),
      expect.anything()
    );
    expect(app.policyTables.syncLocks.size).toBe(0);
  });

  it("should not treat a reported revision of zero as known", async () => {
    const { app, server, setLiked, likePushed } = setup({ liked: false });

    const sync = app.dispatchAndWait(setLiked(true));
    await flush();
    server.requests[0].answer(0);
    await sync;

    app.dispatchSync(likePushed({ liked: false, revision: 0 }));
    expect(app.state).toEqual({ liked: false, revision: 0 });
  });

  it("should drop the local intents on teardown", async () => {
    const { app, server, setLiked } = setup({ liked: false });
    const register = vi.spyOn(app.policyTables, "register");

    const sync = app.dispatchAndWait(setLiked(true));
    await flush();
    server.requests[0].answer(1);
    await sync;

    expect(register).toHaveBeenCalledTimes(1);
    const [intents] = register.mock.calls[0];
    expect(intents).toHaveProperty("size", 1);

    app.teardown();
    expect(intents).toHaveProperty("size", 0);
  });

  it("should bump the local revision once per dispatch", async () => {
    const { app, server, setLiked } = setup({ liked: false });

    const first = app.dispatchAndWait(setLiked(true));
    await flush();
    const context = server.requests[0].context;
    expect([context.localRevision(), context.localRevision()]).toEqual([1, 1]);

    server.requests[0].answer(1);
    await first;
    const second = app.dispatchAndWait(setLiked(false));
    await flush();
    expect(server.requests[1].context.localRevision()).toBe(2);

    server.requests[1].answer(2);
    await second;
  });

  it("should let a newer push win over an older local intent", async () => {
    const { app, server, setLiked, likePushed, applyServerResponseToState } = setup({
      liked: false,
      revision: 1,
    });

    const first = app.dispatchAndWait(setLiked(true));
    await flush();
    await app.dispatchAndWait(setLiked(false));
    app.dispatchSync(likePushed({ liked: true, revision: 3 }));

    server.requests[0].answer(2, { liked: false, revision: 2 });
    await first;

    expect(server.requests).toHaveLength(1);
    expect(applyServerResponseToState).not.toHaveBeenCalled();
    expect(app.state).toEqual({ liked: true, revision: 3 });
  });

  it("should follow up with the local intent even when a push overwrote it", async () => {
    const { app, server, setLiked, likePushed, applyServerResponseToState } = setup({
      liked: false,
      revision: 1,
    });

    const first = app.dispatchAndWait(setLiked(true));
    await flush();
    await app.dispatchAndWait(setLiked(false));
    app.dispatchSync(likePushed({ liked: true, revision: 2 }));
    expect(app.state).toEqual({ liked: true, revision: 2 });

    server.requests[0].answer(3, { liked: true, revision: 3 });
    await flush();
    expect(server.requests.map((r) => r.value)).toEqual([true, false]);
    expect(applyServerResponseToState).not.toHaveBeenCalled();

    server.requests[1].answer(4, { liked: false, revision: 4 });
    await first;

    expect(applyServerResponseToState).toHaveBeenCalledTimes(1);
    expect(app.state).toEqual({ liked: false, revision: 4 });
  });
});
