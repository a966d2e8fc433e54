import type { Application } from "./app";

export interface Plugin {
  name: string;
  setup(app: Application): Promise<void> | void;
  start?(): Promise<void> | void;
  stop?(): Promise<void> | void;
}
