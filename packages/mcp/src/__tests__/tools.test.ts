/**
 * @module tools.test
 * Tests for the MCP wire mapping of catalog descriptors and envelopes.
 */

import { describe, it, expect } from 'vitest';
import { TOOL_CATALOG } from '@draftcast/core';
import { formatToolResult, toMcpTools } from '../tools.js';

describe('toMcpTools', () => {
  it('maps every descriptor in order', () => {
    const tools = toMcpTools(TOOL_CATALOG);
    expect(tools.map((tool) => tool.name)).toEqual([
      'create_draft',
      'add_video',
      'add_audio',
      'add_image',
      'add_text',
      'add_subtitle',
      'add_effect',
      'add_sticker',
      'save_draft',
    ]);
  });

  it('omits required when a tool has none', () => {
    const [createDraft] = toMcpTools(TOOL_CATALOG);
    expect(createDraft?.inputSchema.type).toBe('object');
    expect(createDraft?.inputSchema).not.toHaveProperty('required');
  });

  it('returns mutable copies of the frozen catalog', () => {
    const addText = toMcpTools(TOOL_CATALOG).find((tool) => tool.name === 'add_text');
    expect(addText?.inputSchema.required).toEqual(['text', 'start', 'end']);
    expect(Object.isFrozen(addText?.inputSchema.required)).toBe(false);
  });
});

describe('formatToolResult', () => {
  it('wraps a success as one text item', () => {
    const result = formatToolResult({ success: true, draft_id: 'd-1', state: 'COMPOSING' });
    expect(result.isError).toBe(false);
    expect(result.content).toHaveLength(1);
    expect(JSON.parse(result.content[0]?.text ?? '')).toEqual({ success: true, draft_id: 'd-1', state: 'COMPOSING' });
  });

  it('marks a failure as an error', () => {
    const result = formatToolResult({ success: false, error: 'Invalid draft_id', kind: 'InvalidDraftId' });
    expect(result.isError).toBe(true);
    expect(JSON.parse(result.content[0]?.text ?? '')).toEqual({
      success: false,
      error: 'Invalid draft_id',
      kind: 'InvalidDraftId',
    });
  });
});
