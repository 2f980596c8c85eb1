// Global test setup
import 'jest';

// Mock chalk so assertions see plain strings
jest.mock('chalk', () => {
  const identity = jest.fn((str: string) => str);
  const styles = {
    green: identity,
    red: identity,
    yellow: identity,
    blue: identity,
    cyan: identity,
    gray: identity,
    bold: identity,
    dim: identity,
  };
  return { ...styles, default: styles };
});

jest.setTimeout(30000);

// Mock process.exit to prevent tests from actually exiting
jest.spyOn(process, 'exit').mockImplementation((code?: string | number | null | undefined) => {
  throw new Error(`Process.exit called with code: ${code}`);
});

export {};
