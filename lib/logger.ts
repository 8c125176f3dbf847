export type DetectionLogger = Pick<Console, "info" | "warn" | "error">;

export const consoleLogger: DetectionLogger = console;

export const silentLogger: DetectionLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
