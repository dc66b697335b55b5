import { PhpSwitchCommand } from '../cli/PhpSwitchCommand';
import { VersionIdentifier } from '../types/Version';

export default class Current extends PhpSwitchCommand {
  static override description = 'Print the PHP version Homebrew currently links';

  static override examples = ['<%= config.bin %> <%= command.id %>'];

  public async run(): Promise<void> {
    await this.parse(Current);

    let current: VersionIdentifier | null = null;
    try {
      const ctx = await this.context();
      current = await ctx.brew.currentLinked();
    } catch (error) {
      this.fail('Failed to read the current version', error);
    }

    if (!current) {
      this.error('No PHP version is linked', { exit: 1 });
    }
    this.log(current);
  }
}
