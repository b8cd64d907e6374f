import { formatProjects } from "@app/clockify/lib/output";
import type { CommandContext, CommandOf } from "./context";

export async function projectsCommand(command: CommandOf<"projects">, context: CommandContext): Promise<void> {
    const { workspaceId } = await context.session();
    const projects = await context.api.getProjects(workspaceId, { archived: command.archived });
    console.log(formatProjects(projects, command.format, context.output));
}
