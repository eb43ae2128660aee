import { access, constants } from 'fs';

export const fileExists = (filepath: string) => {
  return new Promise<boolean>(resolve => {
    access(filepath, constants.F_OK, error => {
      resolve(!error);
    });
  });
};

/**
 * 'gpspipe -r -n 10' => ['gpspipe', '-r', '-n', '10']
 */
export const splitCommand = (cli: string): string[] => {
  return cli.split(' ').filter(part => part.length > 0);
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);
