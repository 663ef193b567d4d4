/**
 * Render pipeline modules export
 */

export { renderEvents } from "./renderer";
export type { RendererOptions } from "./renderer";
export { assemble, toRenderIssue } from "./assembler";
