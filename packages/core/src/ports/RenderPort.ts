import type { RenderableReport } from "../domain/ErrorGroup.js";

export interface RenderOptions {
  language?: string;
}

export interface RenderPort {
  render(reports: RenderableReport[], opts?: RenderOptions): Promise<Buffer>;
}
