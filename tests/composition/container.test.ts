import { buildToolRegistry, AVAILABLE_TOOL_CLASSES } from '../../src/composition/container';
import { FSTAR_TOOL_SCHEMA } from '../../src/shared/toolSchemas';

const OPTIONS = { verifierHost: 'http://verifier.test:8005', logLevel: 'error' as const };

describe('buildToolRegistry', () => {
  let fetchSpy: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

  beforeEach(() => {
    fetchSpy = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('registers both tools when no config is given', () => {
    const registry = buildToolRegistry({}, OPTIONS);
    expect(registry.names()).toEqual(['tools/list', 'tools/execute_fstar']);
    expect(AVAILABLE_TOOL_CLASSES).toEqual(['ListTool', 'FStarExecutionTool']);
  });

  test('listed descriptors cannot change the live schema or later registries', () => {
    const listed = buildToolRegistry({}, OPTIONS).list()[1];

    expect(() => listed.required.push('timeout')).toThrow();
    expect(() => {
      listed.parameters.code.type = 'number';
    }).toThrow();

    const fresh = buildToolRegistry({}, OPTIONS);
    expect(fresh.get('tools/execute_fstar')?.getSchema().function.parameters).toEqual({
      type: 'object',
      properties: { code: { type: 'string', description: 'F* code to execute' } },
      required: ['code'],
    });
    expect(fresh.list()[1].required).toEqual(['code']);
  });

  test('skips unknown tool classes', () => {
    const registry = buildToolRegistry(
      { tools: [{ class_name: 'ShellTool', config: {} }, { class_name: 'ListTool', config: {} }] },
      OPTIONS
    );
    expect(registry.names()).toEqual(['tools/list']);
  });

  test('applies a configured schema override', () => {
    const registry = buildToolRegistry(
      {
        tools: [
          {
            class_name: 'FStarExecutionTool',
            config: {},
            tool_schema: {
              type: 'function',
              function: { ...FSTAR_TOOL_SCHEMA.function, name: 'fstar_check' },
            },
          },
        ],
      },
      OPTIONS
    );
    expect(registry.names()).toEqual(['fstar_check']);
  });

  test('verification tool posts to the configured verifier host', async () => {
    fetchSpy.mockResolvedValue(
      new Response(JSON.stringify({ return_code: 0, score: 1.0, messages: 'OK' }), { status: 200 })
    );
    const registry = buildToolRegistry({}, OPTIONS);

    const res = await registry.invoke(
      'tools/execute_fstar',
      { code: 'let x = 1' },
      { tools_kwargs: { example_name: 'problem_42' } }
    );

    expect(res).toEqual({ message: 'Verification Success: True\nOK', score: 0, metadata: {} });
    expect(fetchSpy.mock.calls[0][0]).toBe('http://verifier.test:8005/check_problem_solution');
  });

  test('per-tool server_host overrides the default host', async () => {
    fetchSpy.mockResolvedValue(new Response(JSON.stringify({ return_code: 1 }), { status: 200 }));
    const registry = buildToolRegistry(
      { tools: [{ class_name: 'FStarExecutionTool', config: { server_host: 'http://other.test/' } }] },
      OPTIONS
    );

    const res = await registry.invoke(
      'tools/execute_fstar',
      { code: 'x' },
      { tools_kwargs: { example_name: 'p' } }
    );

    expect(res.message).toBe('Verification Success: False\n');
    expect(fetchSpy.mock.calls[0][0]).toBe('http://other.test/check_problem_solution');
  });

  test('contract_violation "throw" surfaces missing context to the caller', async () => {
    const registry = buildToolRegistry(
      { tools: [{ class_name: 'FStarExecutionTool', config: { contract_violation: 'throw' } }] },
      OPTIONS
    );

    await expect(registry.invoke('tools/execute_fstar', { code: 'x' })).rejects.toThrow(
      'Missing "tools_kwargs.example_name" in call context.'
    );
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  test('list tool returns the catalog through the registry', async () => {
    const registry = buildToolRegistry({}, OPTIONS);
    const res = await registry.invoke('tools/list', {});
    const catalog: unknown = JSON.parse(res.message);
    expect(catalog).toEqual([
      {
        name: 'tools/execute_fstar',
        description: 'A tool that executes the given fstar code.',
        parameters: { code: { type: 'string', description: 'F* code to execute' } },
        required: ['code'],
      },
    ]);
  });
});
