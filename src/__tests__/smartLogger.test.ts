import { LogCategory, LogLevel, logger, parseLogLevel, SmartLogger } from "../utils/smartLogger";

const verbose = {
  enableConsole: true,
  isCompetitionMode: false,
  minLevel: LogLevel.DEBUG,
  enabledCategories: Object.values(LogCategory),
};

describe("SmartLogger", () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logger.configure(verbose);
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  afterAll(() => {
    logger.disableAll();
  });

  it("should be a singleton", () => {
    expect(SmartLogger.getInstance()).toBe(logger);
  });

  it("should prefix messages with the level and category", () => {
    logger.info(LogCategory.AI, "hello", 42);
    logger.warn(LogCategory.HTTP, "careful");
    logger.error(LogCategory.GENERAL, "broken");

    expect(logSpy).toHaveBeenCalledWith("ℹ️  [AI] hello", 42);
    expect(warnSpy).toHaveBeenCalledWith("⚠️  [HTTP] careful");
    expect(errorSpy).toHaveBeenCalledWith("❌ [GENERAL] broken");
  });

  it("should drop messages below the minimum level", () => {
    logger.configure({ minLevel: LogLevel.INFO });

    logger.debug(LogCategory.AI, "hidden");
    logger.info(LogCategory.AI, "shown");

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith("ℹ️  [AI] shown");
  });

  it("should only log errors in competition mode", () => {
    logger.configure({ isCompetitionMode: true });

    logger.info(LogCategory.PHASE, "hidden");
    logger.warn(LogCategory.PHASE, "hidden");
    logger.error(LogCategory.PHASE, "shown");

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith("❌ [PHASE] shown");
  });

  it("should drop disabled categories", () => {
    logger.configure({
      enabledCategories: verbose.enabledCategories.filter(
        (category) => category !== LogCategory.GAME_STATE
      ),
    });

    logger.info(LogCategory.GAME_STATE, "hidden");
    logger.info(LogCategory.AI, "shown");

    expect(logSpy).toHaveBeenCalledTimes(1);
  });

  it("should log nothing once disabled", () => {
    logger.disableAll();

    logger.error(LogCategory.GENERAL, "hidden");

    expect(errorSpy).not.toHaveBeenCalled();
  });

  describe("performance", () => {
    it("should return the result of the timed call", () => {
      expect(logger.performance("sum", () => 1 + 2)).toBe(3);
    });

    it("should warn about slow calls", () => {
      jest.spyOn(Date, "now").mockReturnValueOnce(1000).mockReturnValueOnce(1250);

      logger.performance("decision", () => "UP");

      expect(warnSpy).toHaveBeenCalledWith(
        "⚠️  [PERFORMANCE] decision took 250ms (slow!)"
      );
    });

    it("should report fast calls at debug level", () => {
      jest.spyOn(Date, "now").mockReturnValueOnce(1000).mockReturnValueOnce(1004);

      logger.performance("decision", () => "UP");

      expect(logSpy).toHaveBeenCalledWith("🔍 [PERFORMANCE] decision took 4ms");
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it("should skip timing when performance warnings are filtered", () => {
      logger.configure({
        enabledCategories: verbose.enabledCategories.filter(
          (category) => category !== LogCategory.PERFORMANCE
        ),
      });
      const now = jest.spyOn(Date, "now");

      expect(logger.performance("decision", () => "UP")).toBe("UP");
      expect(now).not.toHaveBeenCalled();
    });
  });
});

describe("parseLogLevel", () => {
  it("should map known names", () => {
    expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(" ERROR ")).toBe(LogLevel.ERROR);
    expect(parseLogLevel("none")).toBe(LogLevel.NONE);
  });

  it("should return undefined for unknown or missing names", () => {
    expect(parseLogLevel("verbose")).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
