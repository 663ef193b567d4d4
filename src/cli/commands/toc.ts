/**
 * TOC command - Renders the heading table through a Handlebars template
 */

import { z } from "zod";
import { render } from "../../render";
import { formatIssue, loadTocTemplate, readSource } from "../../utils";
import { createContext, describeFailure, fail } from "../shared";

const TocOptionsSchema = z.object({
  template: z.string().optional(),
  fallbackSlug: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof TocOptionsSchema>;

export async function tocCommand(
  file: string | undefined,
  opts: Options,
): Promise<void> {
  try {
    const options = TocOptionsSchema.parse(opts);

    const { config, logger } = await createContext(options, {
      toc: options.template ? { template: options.template } : {},
      render: options.fallbackSlug ? { fallbackSlug: options.fallbackSlug } : {},
    });

    // Load the template first so a bad path fails before any reading
    const template = await loadTocTemplate(config.toc.template);
    logger.debug(`Using ${config.toc.template ?? "built-in"} TOC template`);

    const source = await readSource(file, config.input.maxBytes);
    const result = render(source, { fallbackSlug: config.render.fallbackSlug });

    if (!result.ok) {
      fail(formatIssue(result.error));
      return;
    }

    process.stdout.write(template({ headings: result.headings }));
  } catch (error) {
    fail(describeFailure(error));
  }
}
