// config/paths.ts
import path from 'path';

const projectRoot = path.resolve(__dirname, '../..');

/**
 * Static paths configuration
 * Relative paths from the config file or the environment resolve against `root`
 */
export const paths = {
  root: projectRoot,
  configFile: path.join(projectRoot, 'config', 'config.yaml'),
  envFile: path.join(projectRoot, '.env'),
  packageJson: path.join(projectRoot, 'package.json'),
  letters: {
    templatePath: path.join(projectRoot, 'templates', 'letters'),
    staticPath: path.join(projectRoot, 'static'),
    outputPath: path.join(projectRoot, 'output'),
  },
};
