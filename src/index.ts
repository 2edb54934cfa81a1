import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
    CallToolRequestSchema,
    ErrorCode,
    ListToolsRequestSchema,
    McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { AssetLoadError } from "./lib/asset.js";
import { loadConfig, resolveVersion, type CattoConfig } from "./lib/config.js";
import { createRandomSource, type RandomSource } from "./lib/rng.js";
import { UnknownPatternError } from "./engine/registry.js";
import { renderCatInputSchema, SelectionConflictError } from "./tools/render_cat.js";
import { tools, toolHandlers } from "./tools/index.js";

export { applyPattern, type PatternSpec, type PatternKind } from "./engine/pattern.js";
export { renderColorized, stripColor, plainText, toArt, type ColorizedText } from "./engine/colorize.js";
export { randomPattern, findPattern, findProfile, RANDOM_PATTERNS, PROFILES } from "./engine/registry.js";
export { createColorTable, defaultColorTable, type ColorName } from "./lib/color/ansi.js";
export { renderCatHandler, type RenderCatInput, type RenderCatOutput } from "./tools/render_cat.js";

const emptyArgsSchema = z.object({}).strict();

function isTestEnvironment(): boolean {
    return process.env.NODE_ENV === "test" || typeof process.env.VITEST !== "undefined";
}

function textResult(result: unknown) {
    return {
        content: [
            {
                type: "text" as const,
                text: JSON.stringify(result, null, 2),
            },
        ],
    };
}

/**
 * Catto MCP Server
 * Serves colored ASCII cats to MCP clients
 */
export class CattoServer {
    private server: Server;
    private config: CattoConfig;
    private random: RandomSource;

    constructor(config: CattoConfig = loadConfig()) {
        this.config = config;
        this.random = createRandomSource(config.seed);
        this.server = new Server(
            {
                name: "catto-mcp",
                version: resolveVersion(config),
            },
            {
                capabilities: {
                    tools: {},
                },
            }
        );

        this.setupToolHandlers();

        // Error handling
        this.server.onerror = (error) => console.error("[MCP Error]", error);

        // Only set up SIGINT handler if not in test environment
        if (!isTestEnvironment()) {
            process.on("SIGINT", () => {
                this.server.close().then(
                    () => process.exit(0),
                    (error: unknown) => {
                        console.error("[MCP Error]", error);
                        process.exit(1);
                    }
                );
            });
        }
    }

    private setupToolHandlers() {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools,
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const toolName = request.params.name;

            if (toolName === "health") {
                if (!emptyArgsSchema.safeParse(request.params.arguments ?? {}).success) {
                    throw new McpError(ErrorCode.InvalidParams, "Invalid parameters for health");
                }
                return textResult(toolHandlers.health(this.config));
            }

            if (toolName === "list_patterns") {
                if (!emptyArgsSchema.safeParse(request.params.arguments ?? {}).success) {
                    throw new McpError(ErrorCode.InvalidParams, "Invalid parameters for list_patterns");
                }
                return textResult(toolHandlers.list_patterns());
            }

            if (toolName === "render_cat") {
                const parseResult = renderCatInputSchema.safeParse(request.params.arguments ?? {});
                if (!parseResult.success) {
                    throw new McpError(
                        ErrorCode.InvalidParams,
                        parseResult.error.issues[0]?.message || "Invalid parameters for render_cat"
                    );
                }

                try {
                    const result = toolHandlers.render_cat(parseResult.data, {
                        assetDir: this.config.assetDir,
                        random: this.random,
                    });
                    return textResult(result);
                } catch (error) {
                    if (error instanceof UnknownPatternError || error instanceof SelectionConflictError) {
                        throw new McpError(ErrorCode.InvalidParams, error.message);
                    }
                    if (error instanceof AssetLoadError) {
                        throw new McpError(ErrorCode.InternalError, error.message);
                    }
                    throw new McpError(
                        ErrorCode.InternalError,
                        `Failed to render cat: ${error instanceof Error ? error.message : "Unknown error"}`
                    );
                }
            }

            throw new McpError(
                ErrorCode.MethodNotFound,
                `Unknown tool: ${toolName}`
            );
        });
    }

    async run(transport?: Transport) {
        const serverTransport = transport ?? new StdioServerTransport();
        await this.server.connect(serverTransport);
        // Only log when using stdio transport and not in test environment
        if (!transport && !isTestEnvironment()) {
            console.error("Catto MCP server running on stdio");
        }
    }

    async close() {
        await this.server.close();
    }
}
