/**
 * Integration tests for the MCP tool handlers over InMemoryTransport
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { CattoServer } from '../../index.js';

const renderResultSchema = z.object({
    ok: z.literal(true),
    name: z.string(),
    caption: z.string(),
    lines: z.number(),
    text: z.string(),
});

describe('MCP tool handlers', () => {
    let server: CattoServer;
    let client: Client;
    let serverTransport: InMemoryTransport;
    let clientTransport: InMemoryTransport;

    beforeEach(async () => {
        [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

        // Seeded so unseeded draws are predictable
        server = new CattoServer({ seed: 1 });
        await server.run(serverTransport);

        client = new Client(
            {
                name: 'test-client',
                version: '1.0.0',
            },
            {
                capabilities: {},
            }
        );
        await client.connect(clientTransport);
    });

    afterEach(async () => {
        await client.close();
        await server.close();
    });

    async function callJson(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
        const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }, CallToolResultSchema));

        expect(result.content).toHaveLength(1);
        const [content] = result.content;
        if (content.type !== 'text') {
            throw new Error(`Expected text content, got ${content.type}`);
        }
        return JSON.parse(content.text);
    }

    it('should list the three tools', async () => {
        const { tools } = await client.listTools();

        expect(tools.map((tool) => tool.name)).toEqual(['health', 'list_patterns', 'render_cat']);
    });

    describe('render_cat', () => {
        it('should render a profile', async () => {
            const result = renderResultSchema.parse(await callJson('render_cat', { profile: 'lucy', plain: true }));

            expect(result.name).toBe('lucy');
            expect(result.caption).toBe('This is Lucy.');
            expect(result.lines).toBe(83);
        });

        it('should draw from the server seed when the call has none', async () => {
            const first = renderResultSchema.parse(await callJson('render_cat'));
            const second = renderResultSchema.parse(await callJson('render_cat'));

            expect(first.name).toBe('solid_cinnamon');
            expect(second.name).toBe('bicolor_orange_white');
        });

        it('should reject an unknown pattern as invalid params', async () => {
            await expect(callJson('render_cat', { pattern: 'plaid' })).rejects.toMatchObject({
                code: ErrorCode.InvalidParams,
            });
        });

        it('should reject conflicting selections as invalid params', async () => {
            await expect(callJson('render_cat', { profile: 'iggy', pattern: 'calico' })).rejects.toMatchObject({
                code: ErrorCode.InvalidParams,
            });
        });

        it('should reject a spec with an unknown color', async () => {
            await expect(
                callJson('render_cat', { spec: { kind: 'solid', color: 'purple' } })
            ).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
        });
    });

    describe('list_patterns', () => {
        it('should return pattern names and profiles', async () => {
            const result = z
                .object({ patterns: z.array(z.string()), profiles: z.array(z.object({ name: z.string() })) })
                .parse(await callJson('list_patterns'));

            expect(result.patterns).toHaveLength(30);
            expect(result.profiles).toHaveLength(5);
        });

        it('should reject unexpected arguments as invalid params', async () => {
            await expect(callJson('list_patterns', { bogus: true })).rejects.toMatchObject({
                code: ErrorCode.InvalidParams,
            });
        });
    });

    describe('health', () => {
        it('should report the tool count', async () => {
            const result = z
                .object({ ok: z.boolean(), toolCount: z.number(), patternCount: z.number() })
                .parse(await callJson('health'));

            expect(result).toEqual({ ok: true, toolCount: 3, patternCount: 30 });
        });

        it('should reject unexpected arguments as invalid params', async () => {
            await expect(callJson('health', { bogus: 1 })).rejects.toMatchObject({
                code: ErrorCode.InvalidParams,
            });
        });
    });

    it('should answer an unknown tool with MethodNotFound', async () => {
        await expect(callJson('summon_dog')).rejects.toMatchObject({ code: ErrorCode.MethodNotFound });
    });
});

describe('MCP tool handlers without art', () => {
    let server: CattoServer;
    let client: Client;

    beforeEach(async () => {
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

        server = new CattoServer({ assetDir: '/nonexistent/catto-assets' });
        await server.run(serverTransport);

        client = new Client({ name: 'test-client', version: '1.0.0' }, { capabilities: {} });
        await client.connect(clientTransport);
    });

    afterEach(async () => {
        await client.close();
        await server.close();
    });

    it('should answer render_cat with InternalError when the art is missing', async () => {
        await expect(
            client.callTool({ name: 'render_cat', arguments: { profile: 'iggy' } }, CallToolResultSchema)
        ).rejects.toMatchObject({
            code: ErrorCode.InternalError,
            message: expect.stringContaining('ERROR-AS-01: Cannot read ASCII art at /nonexistent/catto-assets/catto.txt'),
        });
    });
});
