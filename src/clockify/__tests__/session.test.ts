import { describe, expect, it } from "vitest";
import { ConfigurationError, UsageError } from "@app/clockify/errors";
import { findWorkspace, resolveSession } from "@app/clockify/lib/session";
import type { ClockifyConfig } from "@app/clockify/types";
import { FakeClockifyApi, user, workspaces } from "./test-utils";

const baseConfig: ClockifyConfig = { apiKey: "test-secret", baseUrl: "https://clockify.test/api/v1", timeoutMs: 1000 };

describe("findWorkspace", () => {
    it("matches id, name and case-insensitive name", () => {
        expect(findWorkspace(workspaces, "ws-2")?.name).toBe("Side Project");
        expect(findWorkspace(workspaces, "Acme")?.id).toBe("ws-1");
        expect(findWorkspace(workspaces, "side project")?.id).toBe("ws-2");
        expect(findWorkspace(workspaces, "Other")).toBeUndefined();
    });
});

describe("resolveSession", () => {
    it("uses the user's active workspace", async () => {
        const api = new FakeClockifyApi();

        await expect(resolveSession(api, baseConfig)).resolves.toEqual({ userId: "user-1", workspaceId: "ws-1" });
        expect(api.calls).toEqual(["getCurrentUser"]);
    });

    it("looks up a configured workspace by name", async () => {
        const api = new FakeClockifyApi();

        await expect(resolveSession(api, { ...baseConfig, workspace: "Side Project" })).resolves.toEqual({
            userId: "user-1",
            workspaceId: "ws-2",
        });
    });

    it("skips the user lookup when user id and workspace are configured", async () => {
        const api = new FakeClockifyApi();

        await resolveSession(api, { ...baseConfig, workspace: "ws-2", userId: "user-9" });

        expect(api.calls).toEqual(["getWorkspaces"]);
    });

    it("reuses a user and workspace list the caller already fetched", async () => {
        const api = new FakeClockifyApi();

        await expect(
            resolveSession(api, { ...baseConfig, workspace: "ws-2" }, { user, workspaces })
        ).resolves.toEqual({ userId: "user-1", workspaceId: "ws-2" });
        expect(api.calls).toEqual([]);
    });

    it("rejects an unknown workspace and lists the known ones", async () => {
        await expect(resolveSession(new FakeClockifyApi(), { ...baseConfig, workspace: "Nope" })).rejects.toThrow(
            new UsageError('No workspace "Nope" found (available: Acme, Side Project)')
        );
    });

    it("fails when the account has no active workspace", async () => {
        const api = new FakeClockifyApi();
        api.getCurrentUser = async () => ({ id: "user-1", activeWorkspace: null, defaultWorkspace: null });

        await expect(resolveSession(api, baseConfig)).rejects.toBeInstanceOf(ConfigurationError);
    });
});
