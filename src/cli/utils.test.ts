import { Command } from 'commander';
import { getGlobalOptions, handleCommandError, parseCliValue, withCommandContext } from './utils.js';

describe('parseCliValue', () => {
  it('parses numbers, booleans and null', () => {
    expect(parseCliValue('42')).toBe(42);
    expect(parseCliValue('-1.5')).toBe(-1.5);
    expect(parseCliValue('true')).toBe(true);
    expect(parseCliValue('null')).toBeNull();
  });

  it('parses objects and arrays', () => {
    expect(parseCliValue('{"a":[1,2]}')).toEqual({ a: [1, 2] });
  });

  it('unquotes a JSON string', () => {
    expect(parseCliValue('"42"')).toBe('42');
  });

  it('keeps anything else as a plain string', () => {
    expect(parseCliValue('hello')).toBe('hello');
    expect(parseCliValue('{broken')).toBe('{broken');
    expect(parseCliValue('')).toBe('');
  });
});

describe('getGlobalOptions', () => {
  it('reads global flags from a subcommand', async () => {
    const program = new Command();
    program.option('--json').option('--verbose').option('--home <path>').option('--dir <path>');
    program.exitOverride();

    let captured: ReturnType<typeof getGlobalOptions> | undefined;
    program.command('probe').action((_opts: unknown, cmd: Command) => {
      captured = getGlobalOptions(cmd);
    });

    await program.parseAsync(['node', 'test', '--json', '--home', '/h', 'probe']);

    expect(captured).toEqual({ json: true, verbose: false, home: '/h', dir: undefined });
  });
});

describe('withCommandContext', () => {
  it('rejects when not called by Commander', async () => {
    const action = withCommandContext(() => {});
    await expect(action('a', {})).rejects.toThrow(TypeError);
  });
});

describe('handleCommandError', () => {
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
    process.exitCode = undefined;
  });

  it('prints the message and sets the exit code', () => {
    handleCommandError(new Error('boom'), false);

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('Error: boom');
    expect(process.exitCode).toBe(1);
  });

  it('prints the stack when verbose', () => {
    const error = new Error('boom');
    handleCommandError(error, true);

    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenLastCalledWith(error.stack);
  });

  it('stringifies non-Error values', () => {
    handleCommandError('plain', false);

    expect(errorSpy).toHaveBeenCalledWith('Error: plain');
  });
});
