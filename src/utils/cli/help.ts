import chalk from "chalk";
import type { Command } from "commander";

export interface HelpSection {
    title: string;
    /** [label, description] pairs, aligned in two columns */
    rows: Array<[string, string]>;
}

/**
 * Enhance a Commander program with better help UX:
 * - Expands subcommand options in the parent's help output
 * - Appends extra sections (environment variables, examples) after the options
 *
 * Call once on the root program after all commands are registered.
 */
export function enhanceHelp(cmd: Command, sections: HelpSection[] = []): void {
    cmd.addHelpText("after", () => {
        const lines: string[] = [];

        const subs = cmd.commands.filter((sub) => sub.options.some((o) => o.long !== "--help"));
        if (subs.length > 0) {
            lines.push(chalk.dim("\nSubcommand Options:"));
            for (const sub of subs) {
                lines.push(`\n  ${chalk.bold(sub.name())}:`);
                for (const opt of sub.options) {
                    if (opt.long === "--help") {
                        continue;
                    }
                    lines.push(`    ${chalk.dim(opt.flags.padEnd(30))} ${opt.description}`);
                }
            }
        }

        for (const section of sections) {
            lines.push(chalk.dim(`\n${section.title}:`));
            for (const [label, description] of section.rows) {
                lines.push(`  ${label.padEnd(32)} ${description}`);
            }
        }

        return lines.join("\n");
    });
}
