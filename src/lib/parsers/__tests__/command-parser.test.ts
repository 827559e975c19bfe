import { describe, it, expect } from 'vitest';
import { formatCommand, parsePortMapping, splitCommand, toArgv } from '../command-parser';
import { PortMappingError } from '../../errors';

describe('splitCommand', () => {
  it('should split on whitespace', () => {
    expect(splitCommand('tail -f  /dev/null')).toEqual(['tail', '-f', '/dev/null']);
  });

  it('should keep single-quoted text literal', () => {
    expect(splitCommand(`nginx -g 'daemon off;'`)).toEqual(['nginx', '-g', 'daemon off;']);
  });

  it('should handle escapes inside double quotes', () => {
    expect(splitCommand('echo "say \\"hi\\""')).toEqual(['echo', 'say "hi"']);
  });

  it('should treat a backslash outside quotes as an escape', () => {
    expect(splitCommand('touch my\\ file')).toEqual(['touch', 'my file']);
  });

  it('should keep an empty quoted argument', () => {
    expect(splitCommand(`run ''`)).toEqual(['run', '']);
  });

  it('should return no arguments for blank input', () => {
    expect(splitCommand('   ')).toEqual([]);
  });

  it('should throw on an unterminated quote', () => {
    expect(() => splitCommand(`sh -c 'sleep 5`)).toThrow("Unterminated ' quote");
  });
});

describe('toArgv', () => {
  it('should split strings and copy arrays', () => {
    const argv = ['/bin/sh', '-c', 'sleep infinity'];
    expect(toArgv('sleep infinity')).toEqual(['sleep', 'infinity']);
    expect(toArgv(argv)).toEqual(argv);
    expect(toArgv(argv)).not.toBe(argv);
  });
});

describe('formatCommand', () => {
  it('should describe the image default when no command is given', () => {
    expect(formatCommand(null)).toBe('<image default>');
    expect(formatCommand(undefined)).toBe('<image default>');
  });

  it('should join argv arrays', () => {
    expect(formatCommand(['/bin/sh', '-c', 'sleep infinity'])).toBe('/bin/sh -c sleep infinity');
  });
});

describe('parsePortMapping', () => {
  it('should parse host and container ports', () => {
    expect(parsePortMapping('8080:80')).toEqual({ hostPort: 8080, containerPort: 80 });
  });

  it('should tolerate surrounding whitespace', () => {
    expect(parsePortMapping(' 5432:5432 ')).toEqual({ hostPort: 5432, containerPort: 5432 });
  });

  it.each(['8080', '8080:80:90', 'abc:80', '8080:', ':80', '0:80', '8080:65536', '-1:80'])(
    'should reject %s',
    (input) => {
      expect(() => parsePortMapping(input)).toThrow(PortMappingError);
    }
  );

  it('should explain the expected format', () => {
    expect(() => parsePortMapping('8080')).toThrow('Invalid port mapping "8080". Use host_port:container_port');
  });
});
