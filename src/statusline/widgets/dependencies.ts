/**
 * Collects missing commands while a widget checks its dependencies.
 */
export class DependencyChecker {
  private readonly missingRequired: string[] = [];
  private readonly missingOptional: string[] = [];

  constructor(private readonly commandExists: (command: string) => boolean) {}

  /**
   * Require a command on PATH. Optional commands are only recorded.
   * Returns false when a required command is missing.
   */
  requireCommand(command: string, optional = false): boolean {
    if (this.commandExists(command)) return true;
    if (optional) {
      this.missingOptional.push(command);
      return true;
    }
    this.missingRequired.push(command);
    return false;
  }

  /**
   * Require at least one of several alternative commands.
   */
  requireAnyCommand(...commands: string[]): boolean {
    if (commands.some((command) => this.commandExists(command))) return true;
    this.missingRequired.push(`one of: ${commands.join(" ")}`);
    return false;
  }

  get missing(): readonly string[] {
    return this.missingRequired;
  }

  get optionalMissing(): readonly string[] {
    return this.missingOptional;
  }
}
