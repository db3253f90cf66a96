/**
 * Tests for the pino-backed handler
 */

import { expect, test } from "vitest";
import { LogLevels, LogRegistry, PinoHandler, type PinoHandlerOptions } from "../mod.ts";
import { MemoryDestination } from "./helpers.ts";

function setup(options: PinoHandlerOptions = {}) {
  const destination = new MemoryDestination();
  const handler = new PinoHandler({ timestamp: "NONE", ...options, destination });
  const registry = new LogRegistry();
  registry.setDefaultHandler(handler);
  return { destination, handler, registry };
}

test("writes one JSON line per record with attributes as fields", () => {
  const { destination, registry } = setup();

  registry.getLogger("http").info("started", "port", 8080);

  expect(destination.entries()).toEqual([{ level: 30, port: 8080, module: "http", msg: "started" }]);
});

test("maps levels to pino level numbers", () => {
  const { destination, registry } = setup({ level: "DEBUG" });
  const logger = registry.getDefaultLogger();

  logger.debug("d");
  logger.info("i");
  logger.warn("w");
  logger.error("e");

  expect(destination.entries()).toEqual([
    { level: 20, module: "default", msg: "d" },
    { level: 30, module: "default", msg: "i" },
    { level: 40, module: "default", msg: "w" },
    { level: 50, module: "default", msg: "e" },
  ]);
});

test("defaults to INFO", () => {
  const { destination, handler, registry } = setup();

  registry.getDefaultLogger().debug("hidden");

  expect(handler.enabled(LogLevels.DEBUG)).toBe(false);
  expect(handler.enabled(LogLevels.INFO)).toBe(true);
  expect(destination.lines).toEqual([]);
});

test("module levels override the root level", () => {
  const { destination, handler, registry } = setup({ level: "WARN", modules: { "ext-a": "DEBUG" } });

  registry.getLogger("ext-a").debug("from a");
  registry.getLogger("ext-b").debug("from b");
  registry.getLogger("ext-b").warn("warn from b");

  expect(handler.enabled(LogLevels.DEBUG)).toBe(true);
  expect(destination.entries()).toEqual([
    { level: 20, module: "ext-a", msg: "from a" },
    { level: 40, module: "ext-b", msg: "warn from b" },
  ]);
});

test("a module level can be stricter than the root level", () => {
  const { destination, registry } = setup({ level: "DEBUG", modules: { chatty: "ERROR" } });

  registry.getLogger("chatty").warn("dropped");
  registry.getLogger("chatty").error("kept");

  expect(destination.entries()).toEqual([{ level: 50, module: "chatty", msg: "kept" }]);
});

test("serializes Error attribute values", () => {
  const { destination, registry } = setup();

  registry.getLogger("db").error("query failed", "error", new Error("boom"));

  const [entry] = destination.lines.map((line) => JSON.parse(line));
  expect(entry.error.type).toBe("Error");
  expect(entry.error.message).toBe("boom");
  expect(typeof entry.error.stack).toBe("string");
});

test("ISO timestamps add a time field", () => {
  const { destination, registry } = setup({ timestamp: "ISO" });

  registry.getDefaultLogger().info("stamped");

  const [entry] = destination.lines.map((line) => JSON.parse(line));
  expect(typeof entry.time).toBe("string");
  expect(Number.isNaN(Date.parse(entry.time))).toBe(false);
});

test("EPOCH timestamps add a numeric time field", () => {
  const { destination, registry } = setup({ timestamp: "EPOCH" });

  registry.getDefaultLogger().info("stamped");

  const [entry] = destination.lines.map((line) => JSON.parse(line));
  expect(typeof entry.time).toBe("number");
});

test("records without a module attribute use the root level", () => {
  const { destination, handler } = setup({ level: "WARN", modules: { "ext-a": "DEBUG" } });

  handler.handle({ message: "untagged", level: LogLevels.INFO, attrs: [] });
  handler.handle({ message: "untagged warn", level: LogLevels.WARN, attrs: [] });

  expect(destination.entries()).toEqual([{ level: 40, msg: "untagged warn" }]);
});

test("a __proto__ attribute is written as a field", () => {
  const { destination, registry } = setup();

  registry.getLogger("m").info("x", "__proto__", { admin: true }, "n", 1);

  const [entry] = destination.lines.map((line) => JSON.parse(line));
  expect(Object.getOwnPropertyDescriptor(entry, "__proto__")?.value).toEqual({ admin: true });
  expect(entry.n).toBe(1);
  expect(entry.msg).toBe("x");
});

test("attributes named like pino fields are prefixed", () => {
  const { destination, registry } = setup();

  registry.getLogger("m").info("real", "level", "custom", "msg", "other", "time", 5);

  expect(destination.entries()).toEqual([
    { level: 30, "attr.level": "custom", "attr.msg": "other", "attr.time": 5, module: "m", msg: "real" },
  ]);
});

test("close is a no-op without a log file", () => {
  const { destination, handler, registry } = setup();

  handler.close();
  registry.getDefaultLogger().info("still written");

  expect(destination.entries()).toEqual([{ level: 30, module: "default", msg: "still written" }]);
});
