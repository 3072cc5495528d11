import chalk from 'chalk';

export type Palette = {
  title: (s: string) => string;
  info: (s: string) => string;
  success: (s: string) => string;
  warn: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
};

export function getPalette(env: NodeJS.ProcessEnv = process.env, argv: string[] = process.argv): Palette {
  const noColor = !!env.NO_COLOR || argv.includes('--no-color');
  const c = new chalk.Instance({ level: noColor ? 0 : 3 });
  const theme = (env.CLI_THEME || 'neo').toLowerCase();
  if (theme === 'mono') {
    return {
      title: c.bold.white,
      info: c.white,
      success: c.white,
      warn: c.white,
      error: c.white,
      dim: c.gray,
    };
  }
  // neo (default)
  return {
    title: c.bold.cyan,
    info: c.cyan,
    success: c.green,
    warn: c.yellow,
    error: c.red,
    dim: c.gray,
  };
}
