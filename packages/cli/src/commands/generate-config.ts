import { Command, Flags } from '@oclif/core';
import { existsSync, writeFileSync } from 'fs';
import { GatewayConfigGenerator } from 'gatemock-commons-server';
import { resolve } from 'path';

/**
 * Generate a starter gateway configuration
 */
export default class GenerateConfig extends Command {
  public static override description =
    'Generate a gateway configuration file routing the platform services';

  public static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> -o ./gateway.config.json --service-host my-namespace.svc.cluster.local'
  ];

  public static override flags = {
    output: Flags.string({
      char: 'o',
      description: 'Path for generated config file',
      default: './gateway.config.json'
    }),
    'service-host': Flags.string({
      description: 'Host suffix appended to the service names in backend URLs',
      default: 'svc.cluster.local'
    }),
    force: Flags.boolean({
      char: 'f',
      description: 'Overwrite existing config file',
      default: false
    })
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(GenerateConfig);

    const outputPath = resolve(process.cwd(), flags.output);

    // Check output doesn't exist (unless --force)
    if (existsSync(outputPath) && !flags.force) {
      this.error(
        `Output file already exists: ${outputPath}\nUse --force to overwrite`,
        { exit: 1 }
      );
    }

    const config = new GatewayConfigGenerator().generateSample(
      flags['service-host']
    );

    writeFileSync(outputPath, JSON.stringify(config, null, 2), 'utf-8');

    this.log(`✅ Config generated successfully: ${outputPath}`);
    this.log('');
    this.log('Next steps:');
    this.log(`  1. Check the backend URLs of the ${config.routes?.length ?? 0} routes`);
    this.log('  2. Add mocks for the records the upstream services lack');
    this.log(`  3. Run: gatemock start --config ${flags.output}`);
  }
}
