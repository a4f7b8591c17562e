export interface Reporter {
  info(message: string): void;
  warn(message: string): void;
}

export const consoleReporter: Reporter = {
  info(message: string): void {
    console.log(message);
  },
  warn(message: string): void {
    console.warn(`WARN: ${message}`);
  }
};

