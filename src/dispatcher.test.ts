/**
 * Tests for the Dispatcher
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { Dispatcher } from "./dispatcher.js";
import type { DispatcherOptions } from "./dispatcher.js";
import { HandlerError } from "./errors.js";
import { FilterRegistry } from "./filters/registry.js";
import type { FilterSpec } from "./filters/types.js";
import { HandlerRegistry } from "./handlers/registry.js";
import { StepHandlerStore } from "./handlers/steps.js";
import { CONTINUE_HANDLING, createRegistration } from "./handlers/registration.js";
import type { Handler, RegistrationOptions } from "./handlers/registration.js";
import { MemoryLogger } from "./memory-logger.js";
import { CANCEL_UPDATE, SKIP_HANDLER } from "./middleware.js";
import type { MiddlewareAction } from "./middleware.js";
import type { UpdateKind } from "./updates/types.js";
import { parseUpdate } from "./updates/parse.js";
import { rawCallbackQuery, rawText, textUpdate } from "../test/helpers/fixtures.js";

describe("Dispatcher", () => {
  let filters: FilterRegistry;
  let handlers: HandlerRegistry;
  let logger: MemoryLogger;

  function register<K extends UpdateKind>(
    kind: K,
    spec: FilterSpec<K>,
    handler: Handler<K>,
    options?: RegistrationOptions
  ): void {
    handlers.register(createRegistration(kind, filters.build(kind, spec), handler, options));
  }

  function createDispatcher(options: DispatcherOptions = {}): Dispatcher {
    return new Dispatcher(handlers, { logger, ...options });
  }

  beforeEach(() => {
    filters = new FilterRegistry();
    handlers = new HandlerRegistry();
    logger = new MemoryLogger();
  });

  describe("handler matching", () => {
    it("does nothing when no handler is registered for the kind", async () => {
      const result = await createDispatcher().dispatch(textUpdate(1, "hi"));

      expect(result).toEqual({ kind: "message", matched: 0, cancelled: false, skipped: false, error: null });
    });

    it("invokes only the first matching handler", async () => {
      const calls: string[] = [];
      register("message", { regexp: "a" }, () => void calls.push("first"));
      register("message", {}, () => void calls.push("second"));

      const result = await createDispatcher().dispatch(textUpdate(1, "apple"));

      expect(calls).toEqual(["first"]);
      expect(result.matched).toBe(1);
    });

    it("falls through to later handlers when earlier filters fail", async () => {
      const calls: string[] = [];
      register("message", { commands: ["start", "help"] }, () => void calls.push("command"));
      register("message", { regexp: "foo" }, () => void calls.push("regexp"));
      register("message", {}, () => void calls.push("fallback"));
      const dispatcher = createDispatcher();

      await dispatcher.dispatch(textUpdate(1, "/help"));
      await dispatcher.dispatch(textUpdate(2, "some FOOD"));
      await dispatcher.dispatch(textUpdate(3, "/stop"));

      expect(calls).toEqual(["command", "regexp", "fallback"]);
    });

    it("ignores handlers of other kinds", async () => {
      const onMessage = vi.fn();
      register("message", {}, onMessage);

      await createDispatcher().dispatch(parseUpdate(rawCallbackQuery(1, "x")));

      expect(onMessage).not.toHaveBeenCalled();
    });

    it("stops evaluating predicates at the first failure", async () => {
      const second = vi.fn(() => true);
      register("message", { func: () => false, regexp: "x" }, () => undefined);
      register("message", { func: second }, () => undefined);

      await createDispatcher().dispatch(textUpdate(1, "x"));

      expect(second).toHaveBeenCalledTimes(1);
    });

    it("keeps scanning for passToNext registrations", async () => {
      const calls: string[] = [];
      register("message", {}, () => void calls.push("audit"), { passToNext: true });
      register("message", {}, () => void calls.push("reply"));
      register("message", {}, () => void calls.push("never"));

      const result = await createDispatcher().dispatch(textUpdate(1, "hi"));

      expect(calls).toEqual(["audit", "reply"]);
      expect(result.matched).toBe(2);
    });

    it("keeps scanning when a handler returns CONTINUE_HANDLING", async () => {
      const calls: string[] = [];
      register("message", {}, () => {
        calls.push("first");
        return CONTINUE_HANDLING;
      });
      register("message", {}, () => void calls.push("second"));

      await createDispatcher().dispatch(textUpdate(1, "hi"));

      expect(calls).toEqual(["first", "second"]);
    });

    it("awaits async handlers", async () => {
      let done = false;
      register("message", {}, async () => {
        await new Promise((resolve) => setTimeout(resolve, 1));
        done = true;
      });

      await createDispatcher().dispatch(textUpdate(1, "hi"));

      expect(done).toBe(true);
    });

    it("treats a throwing predicate as no match and logs it", async () => {
      const fallback = vi.fn();
      register(
        "message",
        {
          func: () => {
            throw new Error("bad filter");
          },
        },
        () => undefined,
        { name: "picky" }
      );
      register("message", {}, fallback);

      await createDispatcher().dispatch(textUpdate(5, "hi"));

      expect(fallback).toHaveBeenCalledTimes(1);
      expect(logger.lines("warn")).toEqual([
        "[Dispatcher] Filter 'func' of picky failed on message #5: bad filter",
      ]);
    });

    it("gives each update a fresh data map", async () => {
      const seen: number[] = [];
      register("message", {}, (_message, { data }) => {
        seen.push(data.size);
        data.set("touched", true);
      });
      const dispatcher = createDispatcher();

      await dispatcher.dispatch(textUpdate(1, "a"));
      await dispatcher.dispatch(textUpdate(2, "b"));

      expect(seen).toEqual([0, 0]);
    });
  });

  describe("handler errors", () => {
    it("reports errors to the sink and stops scanning", async () => {
      const sink = vi.fn();
      const later = vi.fn();
      register("message", {}, function failing() {
        throw new Error("kaput");
      });
      register("message", {}, later);
      const dispatcher = createDispatcher();
      dispatcher.setErrorSink(sink);

      const result = await dispatcher.dispatch(textUpdate(9, "hi"));

      expect(later).not.toHaveBeenCalled();
      expect(sink).toHaveBeenCalledTimes(1);
      const error = sink.mock.calls[0][0];
      expect(error).toBeInstanceOf(HandlerError);
      expect(error.message).toBe("Handler failing failed on message #9: kaput");
      expect(error.update.updateId).toBe(9);
      expect(error.cause).toBeInstanceOf(Error);
      expect(result.error).toBe(error);
    });

    it("logs errors by default", async () => {
      register("message", {}, function failing() {
        throw new Error("kaput");
      });

      await createDispatcher().dispatch(textUpdate(3, "hi"));

      expect(logger.lines("error")).toEqual(["[Dispatcher] Handler failing failed on message #3: kaput"]);
    });

    it("rethrows in strict mode without a sink", async () => {
      register("message", {}, () => {
        throw new Error("kaput");
      });

      await expect(createDispatcher({ strict: true }).dispatch(textUpdate(1, "hi"))).rejects.toBeInstanceOf(
        HandlerError
      );
    });

    it("prefers the sink over strict mode", async () => {
      register("message", {}, () => {
        throw new Error("kaput");
      });
      const dispatcher = createDispatcher({ strict: true });
      const sink = vi.fn();
      dispatcher.setErrorSink(sink);

      await expect(dispatcher.dispatch(textUpdate(1, "hi"))).resolves.toMatchObject({ matched: 1 });
      expect(sink).toHaveBeenCalledTimes(1);
    });

    it("logs a failing sink", async () => {
      register("message", {}, () => {
        throw new Error("kaput");
      });
      const dispatcher = createDispatcher();
      dispatcher.setErrorSink(() => {
        throw new Error("sink down");
      });

      await dispatcher.dispatch(textUpdate(1, "hi"));

      expect(logger.lines("error")).toEqual(["[Dispatcher] Error sink failed: sink down"]);
    });
  });

  describe("middleware", () => {
    it("runs pre hooks in order and post hooks in reverse", async () => {
      const calls: string[] = [];
      register("message", {}, () => void calls.push("handler"));
      const dispatcher = createDispatcher();
      dispatcher.use({
        preProcess: () => void calls.push("pre A"),
        postProcess: () => void calls.push("post A"),
      });
      dispatcher.use({
        preProcess: () => void calls.push("pre B"),
        postProcess: () => void calls.push("post B"),
      });

      await dispatcher.dispatch(textUpdate(1, "hi"));

      expect(calls).toEqual(["pre A", "pre B", "handler", "post B", "post A"]);
    });

    it("shares the data map with the handler", async () => {
      let seen: unknown;
      register("message", {}, (_m, { data }) => {
        seen = data.get("lang");
        data.set("replied", true);
      });
      const dispatcher = createDispatcher();
      let replied: unknown;
      dispatcher.use({
        preProcess: (_u, data) => {
          data.set("lang", "en");
        },
        postProcess: (_u, data) => {
          replied = data.get("replied");
        },
      });

      await dispatcher.dispatch(textUpdate(1, "hi"));

      expect(seen).toBe("en");
      expect(replied).toBe(true);
    });

    it("skips handlers but still post-processes on SKIP_HANDLER", async () => {
      const handler = vi.fn();
      const post = vi.fn();
      register("message", {}, handler);
      const dispatcher = createDispatcher();
      dispatcher.use({ preProcess: () => SKIP_HANDLER, postProcess: post });

      const result = await dispatcher.dispatch(textUpdate(1, "hi"));

      expect(handler).not.toHaveBeenCalled();
      expect(post).toHaveBeenCalledTimes(1);
      expect(result.skipped).toBe(true);
    });

    it("drops the update on CANCEL_UPDATE without post-processing", async () => {
      const handler = vi.fn();
      const post = vi.fn();
      const laterPre = vi.fn();
      register("message", {}, handler);
      const dispatcher = createDispatcher();
      dispatcher.use({ preProcess: () => CANCEL_UPDATE, postProcess: post });
      dispatcher.use({ preProcess: laterPre });

      const result = await dispatcher.dispatch(textUpdate(1, "hi"));

      expect(handler).not.toHaveBeenCalled();
      expect(post).not.toHaveBeenCalled();
      expect(laterPre).not.toHaveBeenCalled();
      expect(result.cancelled).toBe(true);
    });

    it("passes the handler error to post hooks", async () => {
      register("message", {}, () => {
        throw new Error("kaput");
      });
      const dispatcher = createDispatcher();
      const post = vi.fn();
      dispatcher.use({ postProcess: post });

      await dispatcher.dispatch(textUpdate(1, "hi"));

      const error = post.mock.calls[0][2];
      expect(error).toBeInstanceOf(HandlerError);
    });

    it("passes null to post hooks after success", async () => {
      register("message", {}, () => undefined);
      const dispatcher = createDispatcher();
      const post = vi.fn();
      dispatcher.use({ postProcess: post });

      await dispatcher.dispatch(textUpdate(1, "hi"));

      expect(post.mock.calls[0][2]).toBeNull();
    });

    it("reports a failing pre hook and skips handlers", async () => {
      const handler = vi.fn();
      const post = vi.fn();
      register("message", {}, handler);
      const dispatcher = createDispatcher();
      const sink = vi.fn();
      dispatcher.setErrorSink(sink);
      dispatcher.use({
        name: "auth",
        preProcess: () => {
          throw new Error("no session");
        },
        postProcess: post,
      });

      const result = await dispatcher.dispatch(textUpdate(4, "hi"));

      expect(handler).not.toHaveBeenCalled();
      expect(sink.mock.calls[0][0].message).toBe("Handler auth.preProcess failed on message #4: no session");
      expect(post.mock.calls[0][2]).toBe(result.error);
      expect(result.skipped).toBe(true);
    });

    it("only runs middleware for its update kinds", async () => {
      const pre = vi.fn();
      register("callback_query", {}, () => undefined);
      const dispatcher = createDispatcher();
      dispatcher.use({ updateKinds: ["message"], preProcess: pre });

      await dispatcher.dispatch(parseUpdate(rawCallbackQuery(1, "x")));

      expect(pre).not.toHaveBeenCalled();
    });

    it("ignores middleware when disabled", async () => {
      const pre = vi.fn((): MiddlewareAction => CANCEL_UPDATE);
      const handler = vi.fn();
      register("message", {}, handler);
      const dispatcher = createDispatcher({ middlewareEnabled: false });
      dispatcher.use({ preProcess: pre });

      await dispatcher.dispatch(textUpdate(1, "hi"));

      expect(pre).not.toHaveBeenCalled();
      expect(handler).toHaveBeenCalledTimes(1);
    });
  });

  describe("update listeners", () => {
    it("see every update before handlers run", async () => {
      const calls: string[] = [];
      register("message", {}, () => void calls.push("handler"));
      const dispatcher = createDispatcher();
      dispatcher.onUpdate((update) => void calls.push(`listener ${update.updateId}`));

      await dispatcher.dispatch(textUpdate(1, "hi"));
      await dispatcher.dispatch(parseUpdate(rawCallbackQuery(2, "x")));

      expect(calls).toEqual(["listener 1", "handler", "listener 2"]);
    });
  });

  describe("submit", () => {
    it("dispatches inline by default", async () => {
      const handler = vi.fn();
      register("message", {}, handler);
      const dispatcher = createDispatcher();

      await dispatcher.submit(textUpdate(1, "hi"));

      expect(dispatcher.mode).toBe("inline");
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it("returns once a pooled dispatch has started", async () => {
      let release: () => void = () => {};
      const blocker = new Promise<void>((resolve) => {
        release = resolve;
      });
      const started: number[] = [];
      register("message", {}, async (_m, { update }) => {
        started.push(update.updateId);
        await blocker;
      });
      const dispatcher = createDispatcher({ concurrency: { mode: "pooled", poolSize: 2 } });

      await dispatcher.submit(textUpdate(1, "a"));
      await dispatcher.submit(textUpdate(2, "b"));

      expect(started).toEqual([1, 2]);
      expect(dispatcher.inFlight).toBe(2);

      release();
      await dispatcher.drain();
      expect(dispatcher.inFlight).toBe(0);
    });

    it("reports one error per failing pooled dispatch", async () => {
      register("message", {}, () => {
        throw new Error("kaput");
      });
      const dispatcher = createDispatcher({ concurrency: { mode: "pooled", poolSize: 2 } });
      const sink = vi.fn();
      dispatcher.setErrorSink(sink);

      await dispatcher.submit(textUpdate(1, "hi"));
      await dispatcher.drain();

      expect(sink).toHaveBeenCalledTimes(1);
      expect(logger.lines("error")).toEqual([]);
    });

    it("refuses pooled work after abandon", async () => {
      const dispatcher = createDispatcher({ concurrency: { mode: "pooled", poolSize: 1 } });
      dispatcher.abandon();

      await expect(dispatcher.submit(parseUpdate(rawText(1, "x")))).rejects.toThrow("Worker pool is closed");
    });

    it("accepts pooled work again after reopen", async () => {
      const handler = vi.fn();
      register("message", {}, handler);
      const dispatcher = createDispatcher({ concurrency: { mode: "pooled", poolSize: 1 } });
      dispatcher.abandon();
      dispatcher.reopen();

      await dispatcher.submit(textUpdate(1, "x"));
      await dispatcher.drain();

      expect(handler).toHaveBeenCalledTimes(1);
    });
  });

  describe("next-step handlers", () => {
    it("runs the chat's steps ahead of middleware and handlers, then forgets them", async () => {
      const calls: string[] = [];
      register("message", {}, () => void calls.push("handler"));
      const steps = new StepHandlerStore();
      steps.register(42, () => void calls.push("step"), "askName");
      const dispatcher = createDispatcher({ steps });
      dispatcher.use({ preProcess: () => void calls.push("middleware") });

      const first = await dispatcher.dispatch(textUpdate(1, "Ada"));
      const second = await dispatcher.dispatch(textUpdate(2, "hi"));

      expect(first.matched).toBe(1);
      expect(second.matched).toBe(1);
      expect(calls).toEqual(["step", "middleware", "handler"]);
      expect(steps.has(42)).toBe(false);
    });
  });
});
