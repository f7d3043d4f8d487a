#!/usr/bin/env -S node --import tsx
/**
 * # quire
 *
 * Parse a markup file into an element tree and print it.
 *
 * ```bash
 * quire page.qm
 * quire --indent 2 --no-color page.qm
 * quire --tree page.qm
 * ```
 *
 * Markup looks like HTML with a few differences: tag names may be color
 * names (`<red>warning</red>`), attribute values need no quotes unless they
 * contain spaces, and single-word attributes are shorthands (`<div block>`).
 *
 * ```html
 * <div id=header center textsize=14pt>
 *   <h1>Title</h1>
 *   <p margin="4px 8px">Some <blue>blue</blue> text</p>
 * </div>
 * ```
 *
 * @module
 */

import { runCli } from './src/cli.ts';

process.exitCode = await runCli(process.argv.slice(2));
