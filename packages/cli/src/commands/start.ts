import { Command, Flags } from '@oclif/core';
import {
  ConfigValidationError,
  GatewayConfigLoader,
  GatewayServer,
  ServerErrorCodes,
  createLoggerInstance,
  defaultAdminPrefix,
  defaultMaxTransactionLogs,
  defaultUpstreamTimeout,
  listenServerEvents
} from 'gatemock-commons-server';

// errors after which the gateway cannot serve anything
const startupErrorCodes = [
  ServerErrorCodes.PORT_ALREADY_USED,
  ServerErrorCodes.PORT_INVALID,
  ServerErrorCodes.HOSTNAME_UNAVAILABLE,
  ServerErrorCodes.HOSTNAME_UNKNOWN,
  ServerErrorCodes.UNKNOWN_SERVER_ERROR
];

/**
 * Start the gateway
 */
export default class Start extends Command {
  public static override description =
    'Start the gateway: serve the mocks and forward the other requests to the routed backends';

  public static override examples = [
    '<%= config.bin %> <%= command.id %> --config ./gateway.config.json',
    '<%= config.bin %> <%= command.id %> -c ./gateway.config.json -p 3000 --upstream-timeout 5000',
    'GATEMOCK_CONFIG=./gateway.config.json <%= config.bin %> <%= command.id %> --log-transaction'
  ];

  public static override flags = {
    config: Flags.string({
      char: 'c',
      description: 'Path to the gateway configuration file',
      env: 'GATEMOCK_CONFIG',
      required: true
    }),
    port: Flags.integer({
      char: 'p',
      description: 'Port to listen on',
      env: 'GATEMOCK_PORT',
      default: 8080
    }),
    hostname: Flags.string({
      char: 'l',
      description: 'Hostname to listen on (all interfaces by default)',
      env: 'GATEMOCK_HOSTNAME'
    }),
    'upstream-timeout': Flags.integer({
      description: 'Time a backend may stay silent before the request fails with a 504, in ms',
      env: 'GATEMOCK_UPSTREAM_TIMEOUT',
      default: defaultUpstreamTimeout,
      min: 1
    }),
    'disable-admin-api': Flags.boolean({
      description: `Do not serve the admin endpoints (${defaultAdminPrefix})`,
      env: 'GATEMOCK_DISABLE_ADMIN_API',
      default: false
    }),
    'log-level': Flags.string({
      description: 'Minimum level of the logged entries',
      env: 'GATEMOCK_LOG_LEVEL',
      options: ['error', 'warn', 'info', 'debug'],
      default: 'info'
    }),
    'log-file': Flags.string({
      description: 'Also write the logs to this file',
      env: 'GATEMOCK_LOG_FILE'
    }),
    'log-transaction': Flags.boolean({
      description: 'Log the request and response headers of every transaction',
      env: 'GATEMOCK_LOG_TRANSACTION',
      default: false
    }),
    'max-transaction-logs': Flags.integer({
      description: 'Number of transactions kept for the admin API',
      env: 'GATEMOCK_MAX_TRANSACTION_LOGS',
      default: defaultMaxTransactionLogs,
      min: 0
    })
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Start);
    const logger = createLoggerInstance({
      level: flags['log-level'],
      logFile: flags['log-file']
    });
    const loader = new GatewayConfigLoader();

    try {
      loader.loadConfig(flags.config);
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        logger.error(`Cannot start the gateway: ${error.message}`, {
          app: 'gatemock',
          issues: error.issues
        });
        this.exit(1);
      }

      throw error;
    }

    const server = new GatewayServer(loader, {
      port: flags.port,
      hostname: flags.hostname,
      enableAdminApi: !flags['disable-admin-api'],
      adminPrefix: defaultAdminPrefix,
      upstreamTimeout: flags['upstream-timeout'],
      maxTransactionLogs: flags['max-transaction-logs']
    });

    listenServerEvents(server, logger, {
      port: flags.port,
      hostname: flags.hostname,
      logTransaction: flags['log-transaction']
    });

    server.on('error', (errorCode) => {
      if (startupErrorCodes.includes(errorCode)) {
        process.exitCode = 1;
        server.stop();
      }
    });

    // the outcome is logged by the config-reloaded and config-reload-rejected listeners
    process.on('SIGHUP', () => {
      server.reloadConfig();
    });

    const shutdown = () => {
      if (!server.address()) {
        process.exit();
      }

      server.once('stopped', () => {
        process.exit();
      });
      server.stop();
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    server.start();
  }
}
