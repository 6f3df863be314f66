import { describe, it, expect } from 'vitest';
import { main, formatOutput, toSerializable } from '@cli/index';
import type { CLIOutput } from '@cli/index';
import { formatError } from '@cli/error/ErrorHandler';
import { TypeConstraintError } from '@core/errors';
import { version } from '@core/version';
import { MemoryFileSystem } from '@tests/utils/MemoryFileSystem';

interface CapturedOutput extends CLIOutput {
  out: string[];
  err: string[];
}

function capture(): CapturedOutput {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    color: false,
    stdout: text => {
      out.push(text);
    },
    stderr: text => {
      err.push(text);
    }
  };
}

describe('solconf CLI', () => {
  const fileSystem = new MemoryFileSystem({
    '/proj/main.yaml': 'lr: 0.1\ntags: [a, b]\n',
    '/proj/typed.yaml': '"lr:int": x\n',
    '/proj/sets.yaml': 's: "$:{2, 1}"\n'
  });
  // Keeps the user's real configuration out of the run
  const env = { XDG_CONFIG_HOME: '/nonexistent/solconf-test-config' };

  function run(...argv: string[]): { code: number; io: CapturedOutput } {
    const io = capture();
    const code = main(argv, { io, fileSystem, env });
    return { code, io };
  }

  it('prints the resolved file as JSON', () => {
    const { code, io } = run('resolve', '/proj/main.yaml');
    expect(code).toBe(0);
    expect(io.out.join('')).toBe('{\n  "lr": 0.1,\n  "tags": [\n    "a",\n    "b"\n  ]\n}\n');
    expect(io.err).toEqual([]);
  });

  it('applies overrides and prints YAML', () => {
    const { code, io } = run('resolve', '/proj/main.yaml', 'lr=0.5', "tags[1]='c'", '--format', 'yaml');
    expect(code).toBe(0);
    expect(io.out.join('')).toBe('lr: 0.5\ntags:\n  - a\n  - c\n');
  });

  it('prints the value at an address', () => {
    const { io } = run('resolve', '/proj/main.yaml', '-a', 'tags.0');
    expect(io.out.join('')).toBe('"a"\n');
  });

  it('prints sets as lists', () => {
    const { io } = run('resolve', '/proj/sets.yaml');
    expect(io.out.join('')).toBe('{\n  "s": [\n    2,\n    1\n  ]\n}\n');
  });

  it('prints the settled tree', () => {
    const { code, io } = run('tree', '/proj/main.yaml', 'lr=0.2');
    expect(code).toBe(0);
    expect(io.out.join('')).toBe(
      'mapping\n  lr: scalar 0.2 [overridden]\n  tags: sequence\n    - scalar "a"\n    - scalar "b"\n'
    );
  });

  it('reports resolution errors with their location', () => {
    const { code, io } = run('resolve', '/proj/typed.yaml');
    expect(code).toBe(1);
    expect(io.err.join('')).toBe(
      "error [TYPE_CONSTRAINT] scalar 'lr': Expected a value of type int but got str\n  via <root>\n"
    );
  });

  it('rejects unknown output formats', () => {
    const { code, io } = run('resolve', '/proj/main.yaml', '-f', 'xml');
    expect(code).toBe(1);
    expect(io.err.join('')).toBe("error [CONSTRUCTION] Unknown output format 'xml' (expected json or yaml)\n");
  });

  it('reports missing files', () => {
    const { code, io } = run('resolve', '/proj/none.yaml');
    expect(code).toBe(1);
    expect(io.err.join('')).toBe("error ENOENT: no such file or directory, open '/proj/none.yaml'\n");
  });

  it('prints the version', () => {
    const { code, io } = run('--version');
    expect(code).toBe(0);
    expect(io.out.join('')).toBe(`${version}\n`);
  });

  it('returns the usage exit code for unknown commands', () => {
    const { code, io } = run('frobnicate');
    expect(code).toBe(1);
    expect(io.err.join('')).toContain("unknown command 'frobnicate'");
  });
});

describe('formatOutput', () => {
  it('converts nested sets', () => {
    expect(toSerializable({ a: [new Set(['x'])] })).toEqual({ a: [['x']] });
    expect(formatOutput(null, 'json')).toBe('null\n');
    expect(formatOutput({ a: 1 }, 'yaml')).toBe('a: 1\n');
  });
});

describe('formatError', () => {
  it('adds the stack in debug mode', () => {
    const error = new TypeConstraintError(['int'], 'str');
    const text = formatError(error, { debug: true });
    expect(text.split('\n')[0]).toBe('error [TYPE_CONSTRAINT] Expected a value of type int but got str');
    expect(text.split('\n')[1]).toBe('TypeConstraintError: Expected a value of type int but got str');
  });

  it('renders foreign errors by message', () => {
    expect(formatError('boom')).toBe('error boom');
  });
});
