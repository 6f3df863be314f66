import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

// package.json sits one level above core/
const packageJsonPath = fileURLToPath(new URL('../package.json', import.meta.url));

function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null) {
      const value = Reflect.get(packageJson, 'version');
      if (typeof value === 'string') {
        return value;
      }
    }
  } catch (error) {
    console.warn('Failed to read version from package.json:', error);
  }
  return '0.0.0';
}

export const version = readVersion();
