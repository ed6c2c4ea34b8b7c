//https://github.com/microsoft/TypeScript/issues/57226
//Overrides the types bundled with axe; keep this folder sorted ahead of node_modules
declare module "axe" {
  namespace Axe {
    type Level = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

    type LoggerMethod = (message: unknown, meta?: unknown) => Promise<void>;

    /**
     * Any object exposing console-like methods (console, pino, winston, ...).
     * Axe requires at least `info` or `log`.
     */
    type Logger = Partial<Record<Level | "log", (...args: unknown[]) => void>>;

    interface Options {
      /**
       * Pass the Error itself (and so its stack) to the logger instead of `err.message`
       *
       * @default true
       */
      showStack?: boolean;

      meta?: {
        /**
         * Whether to pass the meta object to logger methods at all
         *
         * @default true
         */
        show?: boolean;
        omittedFields?: string[];
        pickedFields?: (string | symbol)[];
      };

      /**
       * Run hooks but never invoke the logger methods
       *
       * @default false
       */
      silent?: boolean;

      /**
       * @default console
       */
      logger?: Logger;

      /**
       * @default `false` in development, otherwise the hostname
       */
      name?: string | boolean;

      /**
       * @default 'info'
       */
      level?: Level;

      /**
       * Parse application information (via parse-app-info) into meta
       *
       * @default true
       */
      appInfo?: boolean;
    }
  }

  interface Axe extends Record<Axe.Level, Axe.LoggerMethod> {
    setLevel(level: Axe.Level): void;
    setName(name: string): void;
  }

  const Axe: new (config?: Axe.Options) => Axe;

  export default Axe;
}
