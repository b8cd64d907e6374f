import { formatTags } from "@app/clockify/lib/output";
import type { CommandContext, CommandOf } from "./context";

export async function tagsCommand(command: CommandOf<"tags">, context: CommandContext): Promise<void> {
    const { workspaceId } = await context.session();
    const tags = await context.api.getTags(workspaceId, { archived: command.archived });
    console.log(formatTags(tags, command.format, context.output));
}
