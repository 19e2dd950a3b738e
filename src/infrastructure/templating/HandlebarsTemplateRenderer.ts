import handlebars from "handlebars";
import type { JsonObject } from "../../domain/entities/JsonValue";
import {
  TemplateCompileError,
  TemplateRenderError,
  describeError,
} from "../../domain/errors/RelayErrors";
import type { TemplateHandle, TemplateRendererPort } from "../../ports/TemplateRendererPort";

// A double-stash expression directly followed by a literal "}" (`{"v": {{x}}}`).
// Triple-stash openings are skipped by the lookbehind/lookahead pair.
const DOUBLE_STASH_BEFORE_BRACE = /(?<!\{)(\{\{(?!\{)[^{}]*\}\})(?=\})/g;

/**
 * Handlebars lexes `}}}` as a triple-stash close even when the expression was
 * opened with `{{`. An empty comment after the expression splits the braces
 * so the trailing `}` stays literal text; `{{{x}}}` is left untouched.
 */
export const separateClosingBraces = (source: string): string =>
  source.replace(DOUBLE_STASH_BEFORE_BRACE, "$1{{!}}");

/**
 * Logic-less rendering over an isolated Handlebars environment: no custom
 * helpers or partials, prototype access left at Handlebars' default.
 * `{{x}}` is HTML-escaped, `{{{x}}}` is emitted raw.
 */
export class HandlebarsTemplateRenderer implements TemplateRendererPort {
  private readonly engine = handlebars.create();
  // Keyed by handle identity: a handle from another renderer is never found here
  private readonly delegates = new WeakMap<TemplateHandle, handlebars.TemplateDelegate<JsonObject>>();
  private sequence = 0;

  compile(source: string): TemplateHandle {
    let delegate: handlebars.TemplateDelegate<JsonObject>;
    try {
      const ast = this.engine.parse(separateClosingBraces(source));
      // compile() is lazy; precompile surfaces compiler errors at startup
      this.engine.precompile(ast);
      delegate = this.engine.compile<JsonObject>(ast);
    } catch (error) {
      throw new TemplateCompileError(describeError(error));
    }

    const handle: TemplateHandle = Object.freeze({ id: `template_${this.sequence}`, source });
    this.sequence += 1;
    this.delegates.set(handle, delegate);
    return handle;
  }

  render(handle: TemplateHandle, data: JsonObject): string {
    const delegate = this.delegates.get(handle);
    if (!delegate) {
      throw new TemplateRenderError(`template "${handle.id}" is not registered`);
    }

    try {
      return delegate(data);
    } catch (error) {
      throw new TemplateRenderError(describeError(error));
    }
  }
}
