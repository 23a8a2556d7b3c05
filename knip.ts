import type { KnipConfig } from 'knip';

const config: KnipConfig = {
  entry: ['src/index.ts!', 'src/bin/tike.ts!'],
  project: ['src/**/*.ts!'],
};

export default config;
