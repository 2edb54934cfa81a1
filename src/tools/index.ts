/**
 * Tools aggregator - Exports all tool definitions and handlers
 */

import type { CattoConfig } from "../lib/config.js";
import { healthTool, healthHandler, type HealthOutput } from "./health.js";
import { listPatternsTool, listPatternsHandler, type ListPatternsOutput } from "./list_patterns.js";
import {
    renderCatTool,
    renderCatHandler,
    type RenderCatInput,
    type RenderCatOptions,
    type RenderCatOutput,
} from "./render_cat.js";

/**
 * Tool definition type
 */
export interface ToolDefinition {
    name: string;
    description: string;
    inputSchema: {
        type: "object";
        properties?: Record<string, unknown>;
        required?: string[];
    };
}

/**
 * All tool definitions
 */
export const tools: ToolDefinition[] = [healthTool, listPatternsTool, renderCatTool];

/**
 * Handlers keyed by tool name, taking already validated arguments
 */
export const toolHandlers = {
    health: (config?: CattoConfig): HealthOutput => healthHandler(tools.length, config),
    list_patterns: (): ListPatternsOutput => listPatternsHandler(),
    render_cat: (args: RenderCatInput, options?: RenderCatOptions): RenderCatOutput =>
        renderCatHandler(args, options),
};
