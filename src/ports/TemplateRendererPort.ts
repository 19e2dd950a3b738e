import type { JsonObject } from "../domain/entities/JsonValue";

/**
 * Opaque reference to a compiled template. Only the renderer that produced it
 * knows how to render it.
 */
export interface TemplateHandle {
  readonly id: string;
  readonly source: string;
}

export interface TemplateRendererPort {
  /** @throws TemplateCompileError when the source has invalid syntax */
  compile(source: string): TemplateHandle;
  /** @throws TemplateRenderError when the engine rejects the render */
  render(handle: TemplateHandle, data: JsonObject): string;
}
