import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { SymbolMarketDirectory } from "./SymbolMarketDirectory";

describe("SymbolMarketDirectory", () => {
    let tempDir: string;

    before(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "symbol-markets-"));
    });

    after(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it("should resolve known symbols and fall back to the default market", () => {
        const directory = new SymbolMarketDirectory("KOSDAQ", { "005930": "KOSPI" });

        assert.strictEqual(directory.resolve("005930"), "KOSPI");
        assert.strictEqual(directory.resolve("999999"), "KOSDAQ");
    });

    it("should load the bundled symbol file", async () => {
        const directory = new SymbolMarketDirectory("KOSPI");
        await directory.loadFromFile(path.resolve(__dirname, "../../data/symbol-markets.json"));

        assert.strictEqual(directory.resolve("247540"), "KOSDAQ");
        assert.strictEqual(directory.resolve("000660"), "KOSPI");
        assert.strictEqual(directory.size, 9);
    });

    it("should leave the directory unchanged when the file is missing", async () => {
        const directory = new SymbolMarketDirectory("KOSPI", { "086520": "KOSDAQ" });
        await directory.loadFromFile(path.join(tempDir, "missing.json"));

        assert.strictEqual(directory.size, 1);
    });

    it("should reject files with unknown markets", async () => {
        const file = path.join(tempDir, "bad-market.json");
        await fs.writeFile(file, JSON.stringify({ "005930": "NASDAQ" }));

        await assert.rejects(new SymbolMarketDirectory("KOSPI").loadFromFile(file), /is invalid/);
    });

    it("should reject files that are not JSON", async () => {
        const file = path.join(tempDir, "broken.json");
        await fs.writeFile(file, "{not json");

        await assert.rejects(new SymbolMarketDirectory("KOSPI").loadFromFile(file), /is not valid JSON/);
    });
});
