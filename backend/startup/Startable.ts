/** Component with a server-lifetime start/stop hook. */
export interface Startable {
  readonly name: string;
  start(): Promise<void>;
  stop(): Promise<void>;
}
