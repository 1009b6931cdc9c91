import { describe, expect, it, vi } from 'vitest';

import { ToolRegistry, isFinalAnswerTool } from '../../src/agent/tools/registry.js';
import { ToolRegistryError } from '../../src/core/errors.js';
import { Logger } from '../../src/core/logger.js';
import { fakeTool } from '../helpers/fakes.js';

describe('ToolRegistry', () => {
  it('looks tools up case-insensitively', () => {
    const search = fakeTool('Search');
    const registry = ToolRegistry.fromTools([search]);

    expect(registry.get('search')).toBe(search);
    expect(registry.get('SEARCH')).toBe(search);
    expect(registry.has('sEaRcH')).toBe(true);
    expect(registry.get('missing')).toBeUndefined();
  });

  it('lists tools under their declared names', () => {
    const registry = ToolRegistry.fromTools([fakeTool('alpha'), fakeTool('Beta')]);

    expect(registry.names()).toEqual(['alpha', 'Beta']);
    expect(registry.size).toBe(2);
  });

  it('keeps the later tool when two share a name, with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const first = fakeTool('search');
    const second = fakeTool('SEARCH');
    const registry = ToolRegistry.fromTools([first, second], new Logger('warn'));

    expect(registry.get('search')).toBe(second);
    expect(registry.size).toBe(1);
    expect(warn).toHaveBeenCalledWith('[warn] Tool search replaced by SEARCH');
  });

  it('rejects tools named like the final-answer sentinel', () => {
    const registry = new ToolRegistry();

    expect(() => registry.register(fakeTool('None'))).toThrow(ToolRegistryError);
    expect(() => registry.register(fakeTool('None'))).toThrow('Tool name is reserved: None');
  });

  describe('resolve', () => {
    const search = fakeTool('search');
    const registry = ToolRegistry.fromTools([search]);

    it('returns a registered tool', () => {
      expect(registry.resolve('Search')).toEqual({ kind: 'tool', tool: search });
    });

    it('recognises the final-answer sentinel in any case', () => {
      expect(registry.resolve('none')).toEqual({ kind: 'final_answer' });
      expect(registry.resolve('NONE')).toEqual({ kind: 'final_answer' });
    });

    it('reports an unknown name as given', () => {
      expect(registry.resolve('fooTool')).toEqual({ kind: 'unknown', name: 'fooTool' });
    });
  });

  it('isFinalAnswerTool ignores case', () => {
    expect(isFinalAnswerTool('None')).toBe(true);
    expect(isFinalAnswerTool('nothing')).toBe(false);
  });
});
