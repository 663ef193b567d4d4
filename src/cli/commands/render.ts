/**
 * Render command - Renders one document to HTML or to a JSON document
 */

import { z } from "zod";
import { render } from "../../render";
import { formatIssue, formatRenderResult, readSource } from "../../utils";
import { createContext, describeFailure, fail } from "../shared";

const RenderOptionsSchema = z.object({
  json: z.boolean().optional(),
  pretty: z.boolean().optional(),
  diagnostics: z.boolean().optional(),
  fallbackSlug: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof RenderOptionsSchema>;

export async function renderCommand(
  file: string | undefined,
  opts: Options,
): Promise<void> {
  try {
    // Validate CLI options
    const options = RenderOptionsSchema.parse(opts);

    // Load configuration, CLI flags override it
    const { config, logger } = await createContext(options, {
      output: {
        ...(options.json ? { format: "json" as const } : {}),
        ...(options.pretty ? { pretty: true } : {}),
      },
      render: {
        ...(options.diagnostics ? { diagnostics: true } : {}),
        ...(options.fallbackSlug ? { fallbackSlug: options.fallbackSlug } : {}),
      },
    });

    const source = await readSource(file, config.input.maxBytes);
    logger.debug(`Read ${source.length} characters from ${file ?? "stdin"}`);

    const result = render(source, {
      fallbackSlug: config.render.fallbackSlug,
      diagnostics: config.render.diagnostics,
    });

    if (!result.ok) {
      fail(formatIssue(result.error));
      return;
    }

    for (const note of result.notes ?? []) {
      logger.warn(
        `h${note.level} "${note.text}" has no sluggable text, using "${note.slug}"`,
      );
    }
    logger.info(`Rendered ${result.headings.length} headings`);

    process.stdout.write(formatRenderResult(result, config.output));
  } catch (error) {
    fail(describeFailure(error));
  }
}
