import { Command, Flags } from '@oclif/core';
import {
  ConfigValidationError,
  GatewayConfigLoader
} from 'gatemock-commons-server';

/**
 * Check a configuration file without starting the gateway
 */
export default class Validate extends Command {
  public static override description =
    'Validate a gateway configuration file and print its route and mock tables';

  public static override examples = [
    '<%= config.bin %> <%= command.id %> --config ./gateway.config.json'
  ];

  public static override flags = {
    config: Flags.string({
      char: 'c',
      description: 'Path to the gateway configuration file',
      env: 'GATEMOCK_CONFIG',
      required: true
    })
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Validate);
    const loader = new GatewayConfigLoader();

    try {
      const snapshot = loader.loadConfig(flags.config);

      this.log(`✅ Configuration ${snapshot.version} is valid (${snapshot.source})`);
      this.log('');
      this.log(`Mocks (${snapshot.mocks.size}, in evaluation order):`);
      snapshot.mocks.list().forEach((mock) => {
        const methods = mock.methods ? mock.methods.join(',') : '*';

        this.log(`  ${methods} ${mock.pattern} → ${mock.statusCode} ${mock.contentType}`);
      });
      this.log('');
      this.log(`Routes (${snapshot.routes.size}):`);
      snapshot.routes.list().forEach((route) => {
        const pattern = route.kind === 'prefix' ? route.prefix : `/${route.pattern}/`;

        this.log(`  ${pattern} → ${route.backend}`);
      });

      if (snapshot.defaultBackend) {
        this.log(`  (default) → ${snapshot.defaultBackend}`);
      }
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        this.logToStderr(`❌ ${error.name}:`);
        error.issues.forEach((issue) => this.logToStderr(`  • ${issue}`));
        this.exit(1);
      }

      throw error;
    }
  }
}
