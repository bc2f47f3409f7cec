import chalk from 'chalk';
import { DIALECTS } from '../../types/sql';

export function dialectsCommand(): void {
  for (const source of DIALECTS) {
    const targets = DIALECTS.filter(target => target !== source);
    console.log(`${chalk.bold(source)} → ${targets.join(', ')}`);
  }
}
