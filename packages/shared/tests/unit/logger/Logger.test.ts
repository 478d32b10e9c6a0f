/**
 * Unit tests for Logger
 *
 * Tests structured logging, level filtering, performance timers,
 * and sensitive data masking.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Logger, type LoggerConfig, LogLevel } from "../../../src/logger/Logger.js";

describe("Logger", () => {
    let logger: Logger;
    let consoleSpy: {
        debug: jest.SpyInstance;
        info: jest.SpyInstance;
        warn: jest.SpyInstance;
        error: jest.SpyInstance;
    };

    const createTestConfig = (
        overrides: Partial<LoggerConfig> = {},
    ): LoggerConfig => ({
        level: LogLevel.DEBUG,
        component: "test-component",
        enableConsole: true,
        enableFile: false,
        enablePerformanceLogging: true,
        sensitiveFields: ["password", "secret", "token", "key", "authorization"],
        maxStackTraceLines: 3,
        ...overrides,
    });

    const lastJson = (spy: jest.SpyInstance) => {
        const calls = spy.mock.calls;
        return JSON.parse(calls[calls.length - 1][0]);
    };

    beforeEach(() => {
        logger = new Logger(createTestConfig());
        consoleSpy = {
            debug: jest.spyOn(console, "debug").mockImplementation(),
            info: jest.spyOn(console, "info").mockImplementation(),
            warn: jest.spyOn(console, "warn").mockImplementation(),
            error: jest.spyOn(console, "error").mockImplementation(),
        };
    });

    afterEach(() => {
        jest.restoreAllMocks();
        Logger.resetInstances();
        delete process.env.LOG_LEVEL;
    });

    describe("LogLevel Enum", () => {
        it("should have correct severity order", () => {
            expect(LogLevel.DEBUG).toBeLessThan(LogLevel.INFO);
            expect(LogLevel.INFO).toBeLessThan(LogLevel.WARN);
            expect(LogLevel.WARN).toBeLessThan(LogLevel.ERROR);
            expect(LogLevel.ERROR).toBeLessThan(LogLevel.FATAL);
        });
    });

    describe("Basic Logging Methods", () => {
        it("should route each level to the matching console method", () => {
            logger.debug("Debug message");
            logger.info("Info message");
            logger.warn("Warning message");
            logger.error("Error message");
            logger.fatal("Fatal message");

            expect(lastJson(consoleSpy.debug).level).toBe("DEBUG");
            expect(lastJson(consoleSpy.info).message).toBe("Info message");
            expect(lastJson(consoleSpy.warn).level).toBe("WARN");
            expect(consoleSpy.error).toHaveBeenCalledTimes(2);
            expect(lastJson(consoleSpy.error).level).toBe("FATAL");
        });

        it("should include component and timestamp", () => {
            logger.info("Test message");

            const parsed = lastJson(consoleSpy.info);
            expect(parsed.component).toBe("test-component");
            expect(parsed.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
        });
    });

    describe("Log Level Filtering", () => {
        it("should filter info and debug when level is WARN", () => {
            logger = new Logger(createTestConfig({ level: LogLevel.WARN }));

            logger.debug("Debug");
            logger.info("Info");
            logger.warn("Warn");

            expect(consoleSpy.debug).not.toHaveBeenCalled();
            expect(consoleSpy.info).not.toHaveBeenCalled();
            expect(consoleSpy.warn).toHaveBeenCalledTimes(1);
        });

        it("should honour setLogLevel", () => {
            logger.setLogLevel(LogLevel.ERROR);
            logger.warn("ignored");
            expect(consoleSpy.warn).not.toHaveBeenCalled();
            expect(logger.getConfig().level).toBe(LogLevel.ERROR);
        });
    });

    describe("Correlation IDs", () => {
        it("should include correlation ID in log output", () => {
            logger.info("Test", "corr-123");
            expect(lastJson(consoleSpy.info).correlationId).toBe("corr-123");
        });

        it("should generate unique correlation IDs", () => {
            expect(Logger.generateCorrelationId()).not.toBe(
                Logger.generateCorrelationId(),
            );
        });
    });

    describe("Sensitive Data Masking", () => {
        it("should mask sensitive keys and keep the rest", () => {
            logger.info("Login", undefined, {
                password: "test-password",
                user: "surgeon-1",
            });

            const parsed = lastJson(consoleSpy.info);
            expect(parsed.metadata).toEqual({
                password: "[MASKED]",
                user: "surgeon-1",
            });
        });

        it("should mask nested sensitive fields", () => {
            logger.info("Client", undefined, {
                llm: { apiKey: "test-secret", model: "gemini" },
            });

            const parsed = lastJson(consoleSpy.info);
            expect(parsed.metadata.llm).toEqual({
                apiKey: "[MASKED]",
                model: "gemini",
            });
        });
    });

    describe("Error Logging", () => {
        it("should include error details and limit stack lines", () => {
            const error = new Error("boom");
            logger.error("Failure", error);

            const parsed = lastJson(consoleSpy.error);
            expect(parsed.error.name).toBe("Error");
            expect(parsed.error.message).toBe("boom");
            expect(parsed.error.stack.split("\n").length).toBeLessThanOrEqual(3);
        });

        it("should carry a string error code", () => {
            const error = Object.assign(new Error("refused"), { code: "ECONNREFUSED" });
            logger.error("Network", error);
            expect(lastJson(consoleSpy.error).error.code).toBe("ECONNREFUSED");
        });
    });

    describe("Performance Timers", () => {
        it("should start and end a timer", () => {
            const timerId = logger.startTimer("parse");
            expect(logger.getActiveTimerCount()).toBe(1);

            const duration = logger.endTimer(timerId);

            expect(duration).not.toBeNull();
            expect(logger.getActiveTimerCount()).toBe(0);
            const parsed = lastJson(consoleSpy.info);
            expect(parsed.message).toBe("Completed operation: parse");
            expect(parsed.operation).toBe("parse");
        });

        it("should return null for unknown timer", () => {
            expect(logger.endTimer("missing")).toBeNull();
            expect(lastJson(consoleSpy.warn).message).toBe("Timer not found: missing");
        });

        it("should clear all timers", () => {
            logger.startTimer("a");
            logger.startTimer("b");
            logger.clearTimers();
            expect(logger.getActiveTimerCount()).toBe(0);
        });
    });

    describe("Configuration", () => {
        it("should read the level from LOG_LEVEL", () => {
            process.env.LOG_LEVEL = "warn";
            expect(Logger.createConfigFromEnv("cfg").level).toBe(LogLevel.WARN);
        });

        it("should fall back to INFO for unknown levels", () => {
            process.env.LOG_LEVEL = "verbose";
            expect(Logger.createConfigFromEnv("cfg").level).toBe(LogLevel.INFO);
        });

        it("should cache one instance per component", () => {
            const a = Logger.getInstance("pipeline");
            expect(Logger.getInstance("pipeline")).toBe(a);
            expect(Logger.getInstance("parser")).not.toBe(a);
        });

        it("should disable console output", () => {
            logger = new Logger(createTestConfig({ enableConsole: false }));
            logger.info("silent");
            expect(consoleSpy.info).not.toHaveBeenCalled();
        });

        it("should append JSON lines to the configured file", () => {
            const dir = fs.mkdtempSync(path.join(os.tmpdir(), "endovox-log-"));
            const filePath = path.join(dir, "nested", "app.log");
            logger = new Logger(createTestConfig({
                enableConsole: false,
                enableFile: true,
                filePath,
            }));

            logger.info("first");
            logger.warn("second");

            const lines = fs.readFileSync(filePath, "utf8").trim().split("\n");
            expect(lines).toHaveLength(2);
            expect(JSON.parse(lines[1]).message).toBe("second");
            fs.rmSync(dir, { recursive: true, force: true });
        });
    });
});
