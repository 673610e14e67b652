import { describe, it, beforeEach } from "node:test";
import assert from "node:assert";
import { SubscriptionRegistry } from "./SubscriptionRegistry";
import type { StreamMessage } from "../types";
import { ManualClock } from "../utils/clock";
import { NotConnectedError, SubscriptionError } from "../utils/errors";
import { FakeSession, errorFrame, flushMicrotasks, streamFrame, tradeFrame } from "../testing/fakes";

describe("SubscriptionRegistry", () => {
    let session: FakeSession;
    let clock: ManualClock;
    let registry: SubscriptionRegistry;

    const build = (maxSubscriptions = 100, inboundQueueSize = 100) => {
        registry = new SubscriptionRegistry(session, {
            token: "test-token",
            maxSubscriptions,
            inboundQueueSize,
            clock,
        });
    };

    const subscribe = (channel: string, key: string, callback: (message: StreamMessage) => void) =>
        registry.subscribe(channel, key, registry.requestFor(channel, key), callback);

    const sentKeys = () => session.sent.map((envelope) => `${envelope.header.tr_type}:${envelope.body.tr_cd}:${envelope.body.tr_key}`);

    beforeEach(() => {
        session = new FakeSession();
        clock = new ManualClock(1_000);
        build();
    });

    describe("subscribe / unsubscribe", () => {
        it("should keep one record and send once when the same callback subscribes twice", async () => {
            session.connected = true;
            const onTrade = () => undefined;

            await subscribe("S3_", "005930", onTrade);
            await subscribe("S3_", "005930", onTrade);

            assert.strictEqual(registry.getSubscriptions().length, 1);
            assert.strictEqual(registry.getSubscriptions()[0]?.callbackCount, 1);
            assert.deepStrictEqual(sentKeys(), ["3:S3_:005930"]);
            assert.deepStrictEqual(session.sent[0], {
                header: { token: "test-token", tr_type: "3" },
                body: { tr_cd: "S3_", tr_key: "005930" },
            });
        });

        it("should add a second callback to an existing key without sending", async () => {
            session.connected = true;

            await subscribe("S3_", "005930", () => undefined);
            await subscribe("S3_", "005930", () => undefined);

            assert.strictEqual(registry.getSubscriptions()[0]?.callbackCount, 2);
            assert.strictEqual(session.sent.length, 1);
        });

        it("should record but not send while disconnected", async () => {
            await subscribe("VI_", "000000", () => undefined);

            assert.strictEqual(registry.has("VI_", "000000"), true);
            assert.strictEqual(session.sent.length, 0);
            assert.strictEqual(registry.isConnected(), false);
        });

        it("should use account tr_type codes for order channels", () => {
            const request = registry.requestFor("SC1", "");

            assert.strictEqual(request.register.header.tr_type, "1");
            assert.strictEqual(request.unregister.header.tr_type, "2");
        });

        it("should only send unregister when the last callback leaves", async () => {
            session.connected = true;
            const first = () => undefined;
            const second = () => undefined;
            await subscribe("S3_", "005930", first);
            await subscribe("S3_", "005930", second);

            await registry.unsubscribe("S3_", "005930", first);
            assert.strictEqual(registry.has("S3_", "005930"), true);
            assert.deepStrictEqual(sentKeys(), ["3:S3_:005930"]);

            await registry.unsubscribe("S3_", "005930", second);
            assert.strictEqual(registry.has("S3_", "005930"), false);
            assert.deepStrictEqual(sentKeys(), ["3:S3_:005930", "4:S3_:005930"]);
        });

        it("should drop the whole key when no callback is given", async () => {
            session.connected = true;
            await subscribe("S3_", "005930", () => undefined);
            await subscribe("S3_", "005930", () => undefined);

            await registry.unsubscribe("S3_", "005930");

            assert.strictEqual(registry.getSubscriptions().length, 0);
            assert.deepStrictEqual(sentKeys(), ["3:S3_:005930", "4:S3_:005930"]);
        });

        it("should remove the record even when the unregister send fails", async () => {
            session.connected = true;
            await subscribe("S3_", "005930", () => undefined);
            session.failSends = true;

            await registry.unsubscribe("S3_", "005930");

            assert.strictEqual(registry.has("S3_", "005930"), false);
        });

        it("should ignore unsubscribe for an unknown key", async () => {
            session.connected = true;
            await registry.unsubscribe("S3_", "000660");

            assert.strictEqual(session.sent.length, 0);
        });

        it("should reject new keys beyond maxSubscriptions", async () => {
            build(2);
            await subscribe("S3_", "005930", () => undefined);
            await subscribe("S3_", "000660", () => undefined);

            await assert.rejects(subscribe("S3_", "035420", () => undefined), (error: unknown) => {
                assert.ok(error instanceof SubscriptionError);
                assert.strictEqual(error.channel, "S3_");
                assert.strictEqual(error.key, "035420");
                return true;
            });

            // Existing keys still accept callbacks
            await subscribe("S3_", "005930", () => undefined);
            assert.strictEqual(registry.getSubscriptions().length, 2);
        });
    });

    describe("replay", () => {
        it("should replay exactly the desired keys, in registry order, on ready", async () => {
            session.connected = true;
            await subscribe("VI_", "000000", () => undefined);
            await subscribe("S3_", "005930", () => undefined);
            await subscribe("K3_", "247540", () => undefined);
            await registry.unsubscribe("S3_", "005930");

            session.disconnect();
            await subscribe("S3_", "000660", () => undefined);
            session.sent.length = 0;

            session.goReady();
            await registry.flush();

            assert.deepStrictEqual(sentKeys(), ["3:VI_:000000", "3:K3_:247540", "3:S3_:000660"]);
        });

        it("should replay before any operation issued after ready", async () => {
            await subscribe("S3_", "005930", () => undefined);
            await subscribe("S3_", "000660", () => undefined);

            session.goReady();
            void registry.unsubscribe("S3_", "005930");
            await registry.flush();

            assert.deepStrictEqual(sentKeys(), ["3:S3_:005930", "3:S3_:000660", "4:S3_:005930"]);
        });

        it("should continue replaying after one key fails", async () => {
            await subscribe("S3_", "005930", () => undefined);
            await subscribe("S3_", "000660", () => undefined);
            let calls = 0;
            const originalSend = session.send.bind(session);
            session.send = async (payload) => {
                calls++;
                if (calls === 1) throw new Error("write failed");
                await originalSend(payload);
            };

            session.goReady();
            await registry.flush();

            assert.strictEqual(calls, 2);
            assert.deepStrictEqual(sentKeys(), ["3:S3_:000660"]);
        });

        it("should abandon a replay once the connection it started on is replaced", async () => {
            await subscribe("S3_", "005930", () => undefined);
            await subscribe("S3_", "000660", () => undefined);
            await subscribe("S3_", "035720", () => undefined);
            let calls = 0;
            const originalSend = session.send.bind(session);
            session.send = async (payload) => {
                calls++;
                if (calls === 2) {
                    // Link drops and comes back before the failed write is reported
                    session.disconnect();
                    session.goReady();
                    throw new NotConnectedError();
                }
                await originalSend(payload);
            };

            session.goReady();
            await registry.flush();
            await registry.flush();

            assert.strictEqual(calls, 5);
            assert.deepStrictEqual(sentKeys(), [
                "3:S3_:005930",
                "3:S3_:005930",
                "3:S3_:000660",
                "3:S3_:035720",
            ]);
        });
    });

    describe("routing", () => {
        it("should invoke every callback on a key once, in registration order", async () => {
            const calls: string[] = [];
            const first = () => { calls.push("first"); };
            const second = () => { calls.push("second"); };
            await subscribe("S3_", "005930", first);
            await subscribe("S3_", "005930", second);
            await subscribe("S3_", "005930", first);

            session.deliver(tradeFrame("S3_", "005930", "71000"));

            assert.deepStrictEqual(calls, ["first", "second"]);
        });

        it("should build the message from header channel and body key", async () => {
            const received: StreamMessage[] = [];
            await subscribe("S3_", "005930", (message) => received.push(message));

            session.deliver(tradeFrame("S3_", "005930", "71000"));

            assert.strictEqual(received.length, 1);
            const [message] = received;
            assert.strictEqual(message?.channel, "S3_");
            assert.strictEqual(message?.key, "005930");
            assert.strictEqual(message?.family, "kospi_trade");
            assert.strictEqual(message?.body.price, "71000");
            assert.strictEqual(message?.receivedAt.getTime(), 1_000);
            assert.strictEqual(registry.getSubscriptions()[0]?.lastDeliveredAt?.getTime(), 1_000);
        });

        it("should take the channel from the body when the header has none", async () => {
            const received: string[] = [];
            await subscribe("K3_", "247540", (message) => received.push(message.key));

            session.deliver(JSON.stringify({ header: {}, body: { tr_cd: "K3_", tr_key: "247540", price: "98000" } }));

            assert.deepStrictEqual(received, ["247540"]);
        });

        it("should fall through to the all-symbols subscription of the channel", async () => {
            const received: string[] = [];
            await subscribe("VI_", "000000", (message) => received.push(message.key));

            session.deliver(streamFrame("VI_", "005930", { vi_gubun: "1" }));

            assert.deepStrictEqual(received, ["005930"]);
        });

        it("should prefer the exact key over the all-symbols subscription", async () => {
            const calls: string[] = [];
            await subscribe("S3_", "000000", () => { calls.push("all"); });
            await subscribe("S3_", "005930", () => { calls.push("exact"); });

            session.deliver(tradeFrame("S3_", "005930", "71000"));
            session.deliver(tradeFrame("S3_", "000660", "180000"));

            assert.deepStrictEqual(calls, ["exact", "all"]);
        });

        it("should send unmatched messages to default handlers only", async () => {
            const defaults: string[] = [];
            const dispose = registry.onDefault((message) => { defaults.push(`${message.channel}:${message.key}`); });
            await subscribe("S3_", "005930", () => { defaults.push("subscriber"); });

            session.deliver(tradeFrame("K3_", "247540", "98000"));
            session.deliver(streamFrame("XX9", "ABC"));
            session.deliver(tradeFrame("S3_", "005930", "71000"));
            dispose();
            session.deliver(tradeFrame("K3_", "247540", "98100"));

            assert.deepStrictEqual(defaults, ["K3_:247540", "XX9:ABC", "subscriber"]);
        });

        it("should route error responses to the key's error callbacks, not its data callbacks", async () => {
            const data: string[] = [];
            const errors: SubscriptionError[] = [];
            await registry.subscribe(
                "S3_",
                "005930",
                registry.requestFor("S3_", "005930"),
                () => { data.push("data"); },
                (error) => { if (error instanceof SubscriptionError) errors.push(error); },
            );

            session.deliver(errorFrame("S3_", "005930", "10001", "invalid token"));

            assert.deepStrictEqual(data, []);
            assert.strictEqual(errors.length, 1);
            assert.strictEqual(errors[0]?.responseCode, "10001");
            assert.strictEqual(errors[0]?.message, "Broker rejected S3_/005930: invalid token");
        });

        it("should send unclaimed error responses to registry error handlers", async () => {
            const errors: Error[] = [];
            const defaults: string[] = [];
            registry.onError((error) => { errors.push(error); });
            registry.onDefault(() => { defaults.push("default"); });

            session.deliver(errorFrame("K3_", "247540", "10002", "unknown symbol"));

            assert.strictEqual(errors.length, 1);
            assert.ok(errors[0] instanceof SubscriptionError);
            assert.deepStrictEqual(defaults, []);
        });

        it("should not dispatch success acknowledgements without a body", async () => {
            const calls: string[] = [];
            await subscribe("S3_", "005930", () => { calls.push("data"); });
            registry.onDefault(() => { calls.push("default"); });

            session.deliver(errorFrame("S3_", "005930", "00000", "subscribed"));

            assert.deepStrictEqual(calls, []);
        });

        it("should drop malformed frames and keep dispatching", async () => {
            const prices: unknown[] = [];
            await subscribe("S3_", "005930", (message) => { prices.push(message.body.price); });

            session.deliver("not json");
            session.deliver(JSON.stringify({ body: { tr_key: "005930" } }));
            session.deliver(tradeFrame("S3_", "005930", "71000"));

            assert.deepStrictEqual(prices, ["71000"]);
        });

        it("should contain callback failures", async () => {
            const calls: string[] = [];
            await subscribe("S3_", "005930", function throwingCallback() {
                throw new Error("boom");
            });
            await registry.subscribe("S3_", "005930", registry.requestFor("S3_", "005930"), async () => {
                throw new Error("async boom");
            });
            await subscribe("S3_", "005930", () => { calls.push("third"); });

            session.deliver(tradeFrame("S3_", "005930", "71000"));
            await flushMicrotasks();

            assert.deepStrictEqual(calls, ["third"]);
        });

        it("should drop the oldest queued frame when the inbound queue is full", async () => {
            build(100, 1);
            const prices: unknown[] = [];
            let injected = false;
            await subscribe("S3_", "005930", (message) => {
                prices.push(message.body.price);
                if (!injected) {
                    injected = true;
                    registry.handleMessage(tradeFrame("S3_", "005930", "2"));
                    registry.handleMessage(tradeFrame("S3_", "005930", "3"));
                }
            });

            registry.handleMessage(tradeFrame("S3_", "005930", "1"));

            assert.deepStrictEqual(prices, ["1", "3"]);
            assert.strictEqual(registry.getDroppedMessageCount(), 1);
        });
    });
});
