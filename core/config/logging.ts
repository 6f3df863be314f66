import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  // File configuration, used only when SOLCONF_LOG_DIR is set
  files: {
    mainLog: 'solconf.log',
    maxSize: 5242880, // 5MB
    maxFiles: 5,
    tailable: true
  },

  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    tree: {
      level: 'warn'
    },
    modifiers: {
      level: 'warn'
    },
    evaluator: {
      level: 'warn'
    },
    resolution: {
      level: 'warn'
    },
    overrides: {
      level: 'warn'
    },
    loader: {
      level: 'warn'
    },
    config: {
      level: 'warn'
    },
    cli: {
      level: 'error'
    }
  }
} as const;

export type LoggerService = keyof typeof loggingConfig.services;
