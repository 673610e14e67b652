import { describe, it, beforeEach } from "node:test";
import assert from "node:assert";
import { EventEmitter } from "events";
import { StreamSession, computeBackoffDelay } from "./StreamSession";
import type { SessionTransport } from "./StreamSession";
import type { TransportCloseInfo } from "./StreamTransport";
import type { ConnectionState } from "../types";
import { ManualClock } from "../utils/clock";
import { ConnectError, NotConnectedError, ReconnectExhaustedError } from "../utils/errors";
import { flushMicrotasks } from "../testing/fakes";

class FakeTransport extends EventEmitter implements SessionTransport {
    open = false;
    failConnects = false;
    connectCalls = 0;
    readonly frames: string[] = [];

    async connect(): Promise<void> {
        this.connectCalls++;
        if (this.failConnects) {
            throw new ConnectError("connection refused");
        }
        this.open = true;
    }

    async send(frame: string): Promise<void> {
        if (!this.open) throw new NotConnectedError();
        this.frames.push(frame);
    }

    async close(code = 1000, reason = "client closing"): Promise<void> {
        if (!this.open) return;
        this.open = false;
        this.emit("closed", { code, reason } satisfies TransportCloseInfo);
    }

    drop(): void {
        this.open = false;
        this.emit("closed", { code: 1006, reason: "" } satisfies TransportCloseInfo);
    }
}

describe("computeBackoffDelay", () => {
    it("should double from the base and never exceed the cap", () => {
        const policy = { baseDelayMs: 5_000, maxDelayMs: 30_000 };
        const delays = [0, 1, 2, 3, 4, 5].map((attempt) => computeBackoffDelay(attempt, policy));

        assert.deepStrictEqual(delays, [5_000, 10_000, 20_000, 30_000, 30_000, 30_000]);
    });
});

describe("StreamSession", () => {
    let transport: FakeTransport;
    let clock: ManualClock;
    let session: StreamSession;
    let events: string[];

    beforeEach(() => {
        transport = new FakeTransport();
        clock = new ManualClock(0);
        session = new StreamSession(transport, {
            endpoint: "wss://stream.example.test/websocket",
            token: "test-token",
            reconnect: { maxAttempts: 6, baseDelayMs: 100, maxDelayMs: 1_000 },
            clock,
        });
        events = [];
        for (const name of ["opened", "ready", "reconnected", "stopped"]) {
            session.on(name, () => events.push(name));
        }
        session.on("exhausted", ({ attempts }: { attempts: number }) => events.push(`exhausted:${attempts}`));
    });

    it("should connect and emit ready without reconnected on first start", async () => {
        const states: Array<[ConnectionState, ConnectionState]> = [];
        session.on("state", (prev: ConnectionState, next: ConnectionState) => states.push([prev, next]));

        await session.start();

        assert.strictEqual(session.isConnected(), true);
        assert.deepStrictEqual(events, ["opened", "ready"]);
        assert.deepStrictEqual(states, [
            ["disconnected", "connecting"],
            ["connecting", "connected"],
        ]);
    });

    it("should send serialized envelopes only while connected", async () => {
        const envelope = { header: { token: "test-token", tr_type: "3" }, body: { tr_cd: "VI_", tr_key: "000000" } };
        await assert.rejects(session.send(envelope), NotConnectedError);

        await session.start();
        await session.send(envelope);

        assert.deepStrictEqual(transport.frames, [JSON.stringify(envelope)]);
    });

    it("should follow min(base * 2^n, cap) between failed attempts and then give up", async () => {
        transport.failConnects = true;
        const outcome = session.start().then(
            () => undefined,
            (error: unknown) => error,
        );
        await flushMicrotasks();

        const delays: number[] = [];
        while (clock.pendingCount > 0) {
            const [delay] = clock.pendingDelays();
            assert.ok(delay !== undefined);
            delays.push(delay);
            clock.advance(delay);
            await flushMicrotasks();
        }

        assert.deepStrictEqual(delays, [100, 200, 400, 800, 1_000, 1_000]);
        assert.strictEqual(transport.connectCalls, 7);
        assert.strictEqual(session.getState(), "error");
        assert.deepStrictEqual(events, ["exhausted:6"]);

        const error = await outcome;
        assert.ok(error instanceof ReconnectExhaustedError);
        assert.strictEqual(error.attempts, 6);
    });

    it("should emit connection_error for each failed attempt", async () => {
        transport.failConnects = true;
        const errors: Error[] = [];
        session.on("connection_error", (error: Error) => errors.push(error));

        void session.start().catch(() => undefined);
        await flushMicrotasks();
        clock.advance(100);
        await flushMicrotasks();

        assert.strictEqual(errors.length, 2);
        assert.ok(errors[0] instanceof ConnectError);
        assert.strictEqual(session.getStats().lastError, "ConnectError: connection refused");
    });

    it("should reconnect after a dropped connection and emit reconnected after ready", async () => {
        await session.start();
        transport.drop();

        assert.strictEqual(session.getState(), "error");
        assert.deepStrictEqual(clock.pendingDelays(), [100]);

        clock.advance(100);
        await flushMicrotasks();

        assert.strictEqual(session.isConnected(), true);
        assert.deepStrictEqual(events, ["opened", "ready", "opened", "ready", "reconnected"]);
        assert.strictEqual(session.getStats().connectCount, 2);
    });

    it("should reset the backoff after a successful reconnect", async () => {
        await session.start();
        transport.failConnects = true;
        transport.drop();
        clock.advance(100);
        await flushMicrotasks();
        assert.deepStrictEqual(clock.pendingDelays(), [200]);

        transport.failConnects = false;
        clock.advance(200);
        await flushMicrotasks();
        assert.strictEqual(session.isConnected(), true);

        transport.drop();
        assert.deepStrictEqual(clock.pendingDelays(), [100]);
    });

    it("should settle every start() caller when start is called again during backoff", async () => {
        transport.failConnects = true;
        let firstSettled = false;
        let secondSettled = false;
        const first = session.start().then(() => {
            firstSettled = true;
        });
        await flushMicrotasks();
        assert.strictEqual(session.getState(), "error");
        assert.strictEqual(clock.pendingCount, 1);

        const second = session.start().then(() => {
            secondSettled = true;
        });
        await flushMicrotasks();
        assert.strictEqual(transport.connectCalls, 1);
        assert.strictEqual(clock.pendingCount, 1);

        transport.failConnects = false;
        clock.advance(100);
        await flushMicrotasks();
        await Promise.all([first, second]);

        assert.strictEqual(session.getState(), "connected");
        assert.strictEqual(firstSettled, true);
        assert.strictEqual(secondSettled, true);
        assert.strictEqual(transport.connectCalls, 2);
        assert.strictEqual(clock.pendingCount, 0);
    });

    it("should cancel a scheduled reconnect on stop and be idempotent", async () => {
        transport.failConnects = true;
        const started = session.start();
        await flushMicrotasks();
        assert.strictEqual(clock.pendingCount, 1);

        await session.stop();
        await session.stop();
        await started;

        assert.strictEqual(clock.pendingCount, 0);
        assert.strictEqual(session.getState(), "closed");
        assert.deepStrictEqual(events, ["stopped"]);
    });

    it("should not reconnect after stop closes a live connection", async () => {
        await session.start();
        await session.stop();

        assert.strictEqual(session.getState(), "closed");
        assert.strictEqual(clock.pendingCount, 0);
        assert.strictEqual(transport.connectCalls, 1);
    });

    it("should start again after stop", async () => {
        await session.start();
        await session.stop();
        await session.start();

        assert.strictEqual(session.isConnected(), true);
        assert.deepStrictEqual(events, ["opened", "ready", "stopped", "opened", "ready", "reconnected"]);
    });

    it("should forward transport messages", async () => {
        const messages: string[] = [];
        session.on("message", (text: string) => messages.push(text));

        transport.emit("message", '{"header":{}}');

        assert.deepStrictEqual(messages, ['{"header":{}}']);
    });
});
