import { SchemaAdmin } from "../database/sqlDriver";
import { InfrastructureError, describeError } from "../domain/errors";

/**
 * SchemaManager owns the grading schema. Nothing else drops or creates
 * objects: every generation starts from an empty schema and a full replay
 * of the same script.
 */
export class SchemaManager {
  private currentGeneration = 0;

  constructor(
    private readonly admin: SchemaAdmin,
    private readonly schemaScript: string
  ) {}

  /** Number of completed resets so far. */
  get generation(): number {
    return this.currentGeneration;
  }

  /**
   * Drop everything in the schema, then replay the script.
   * Safe to call on an already clean schema.
   */
  async reset(): Promise<void> {
    try {
      await this.admin.dropAllObjects();
    } catch (error) {
      throw new InfrastructureError(`Schema reset failed while dropping objects: ${describeError(error)}`, error);
    }

    try {
      await this.admin.runScript(this.schemaScript);
    } catch (error) {
      throw new InfrastructureError(`Schema reset failed while replaying the schema script: ${describeError(error)}`, error);
    }

    this.currentGeneration++;
  }
}
