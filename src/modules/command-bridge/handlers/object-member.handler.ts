import { Injectable } from '@nestjs/common';
import { BaseCommandHandler, PayloadRule, StandardPayloadValidator } from '../base';
import { CommandHandler } from '../decorators';
import { HandlerExecutionError, ValidationError } from '../errors';
import { DynamicMapping, LiveObjectEntry, PayloadValidator } from '../interfaces';
import { BatchResolutionService } from '../services/batch-resolution.service';
import { HandlerContextService } from '../services/handler-context.service';
import { MemberApplierService } from '../services/member-applier.service';

export const OBJECT_MEMBER_HANDLER_NAME = 'memberManage';

const requireTarget: PayloadRule = (payload) =>
  (payload.objectId === undefined || payload.objectId === null) && (payload.objectPath === undefined || payload.objectPath === null)
    ? "Either 'objectId' or 'objectPath' is required"
    : undefined;

const TARGET_PARAMETERS = { objectId: 'string', objectPath: 'string' } as const;
const BATCH_PARAMETERS = { pattern: 'string', useRegex: 'bool', maxResults: 'int', stopOnError: 'bool' } as const;
const BATCH_DEFAULTS: DynamicMapping = { useRegex: false, stopOnError: false };

/**
 * Reads and writes exposed members of live objects, one target or every
 * target matching a path pattern.
 *
 * Payload keys: `objectId` / `objectPath` (single target), `pattern`,
 * `useRegex`, `maxResults`, `stopOnError` (batch), `propertyChanges` (member
 * name to raw value), `members` (names to read).
 */
@Injectable()
@CommandHandler(OBJECT_MEMBER_HANDLER_NAME)
export class ObjectMemberHandler extends BaseCommandHandler {
  readonly category = 'objectMember';
  readonly supportedOperations = ['inspect', 'update', 'inspectMultiple', 'updateMultiple'];

  constructor(
    context: HandlerContextService,
    private readonly members: MemberApplierService,
    private readonly batch: BatchResolutionService,
  ) {
    super(context);
  }

  protected override createDefaultValidator(): PayloadValidator {
    return new StandardPayloadValidator()
      .registerOperation('inspect', {
        parameters: { ...TARGET_PARAMETERS, members: 'sequence' },
        rules: [requireTarget],
      })
      .registerOperation('update', {
        required: ['propertyChanges'],
        parameters: { ...TARGET_PARAMETERS, propertyChanges: 'mapping' },
        rules: [requireTarget],
      })
      .registerOperation('inspectMultiple', {
        required: ['pattern'],
        parameters: { ...BATCH_PARAMETERS, members: 'sequence' },
        defaults: BATCH_DEFAULTS,
      })
      .registerOperation('updateMultiple', {
        required: ['pattern', 'propertyChanges'],
        parameters: { ...BATCH_PARAMETERS, propertyChanges: 'mapping' },
        defaults: BATCH_DEFAULTS,
      });
  }

  protected executeOperation(operation: string, payload: DynamicMapping): Record<string, unknown> {
    switch (operation) {
      case 'inspect':
        return this.inspect(payload);
      case 'update':
        return this.update(payload);
      case 'inspectMultiple':
        return this.runMultiple(payload, (target) => this.inspectEntry(target, this.getMemberNames(payload)));
      case 'updateMultiple': {
        const changes = this.getChanges(payload);
        return this.runMultiple(payload, (target) => this.updateEntry(target, changes));
      }
      default:
        throw new HandlerExecutionError(`Operation '${operation}' has no implementation`);
    }
  }

  private inspect(payload: DynamicMapping): Record<string, unknown> {
    const target = this.resolveTargetFromPayload(payload);
    const locator = this.describeTarget(target);
    return {
      objectPath: locator?.path ?? null,
      objectId: locator?.id ?? null,
      typeName: this.members.describeType(target)?.name ?? null,
      members: this.members.readMembers(target, this.getMemberNames(payload)),
    };
  }

  private update(payload: DynamicMapping): Record<string, unknown> {
    const target = this.resolveTargetFromPayload(payload);
    const objectPath = this.describeTarget(target)?.path ?? null;
    const result = this.members.applyMembers(target, this.getChanges(payload));
    const hasFailures = Object.keys(result.failed).length > 0;

    if (result.updated.length === 0 && hasFailures) {
      return this.createFailureResponse('No members were updated', { objectPath, failed: result.failed });
    }

    return {
      objectPath,
      typeName: this.members.describeType(target)?.name ?? null,
      updated: result.updated,
      ...(hasFailures ? { failed: result.failed, partialSuccess: result.partialSuccess } : {}),
    };
  }

  private runMultiple(payload: DynamicMapping, perTarget: (target: LiveObjectEntry) => DynamicMapping): Record<string, unknown> {
    const pattern = this.getString(payload, 'pattern', '');
    const resolved = this.batch.resolveTargets(
      pattern,
      this.getBool(payload, 'useRegex'),
      this.getInt(payload, 'maxResults', this.batch.defaultMaxResults),
    );
    const result = this.batch.runBatched(resolved.targets, perTarget, { stopOnError: this.getBool(payload, 'stopOnError') });

    return {
      pattern,
      totalCount: resolved.totalCount,
      truncated: resolved.truncated,
      processedCount: result.results.length,
      successCount: result.successCount,
      errorCount: result.errorCount,
      stopped: result.stopped,
      results: result.results,
      errors: result.errors,
    };
  }

  private inspectEntry(target: LiveObjectEntry, names: string[] | undefined): DynamicMapping {
    return {
      objectPath: target.path,
      typeName: this.members.describeType(target.instance)?.name ?? null,
      members: this.members.readMembers(target.instance, names),
    };
  }

  private updateEntry(target: LiveObjectEntry, changes: DynamicMapping): DynamicMapping {
    const result = this.members.applyMembers(target.instance, changes);
    const failedNames = Object.keys(result.failed);

    if (result.updated.length === 0 && failedNames.length > 0) {
      throw new HandlerExecutionError(`No members were updated: ${failedNames.map((name) => result.failed[name]).join('; ')}`);
    }

    return {
      objectPath: target.path,
      updated: result.updated,
      ...(failedNames.length > 0 ? { failed: result.failed, partialSuccess: result.partialSuccess } : {}),
    };
  }

  private getChanges(payload: DynamicMapping): DynamicMapping {
    const changes = this.getMapping(payload, 'propertyChanges');
    if (!changes) {
      throw new ValidationError("'propertyChanges' must be a mapping");
    }
    return changes;
  }

  private getMemberNames(payload: DynamicMapping): string[] | undefined {
    return this.getSequence(payload, 'members')?.filter((name): name is string => typeof name === 'string');
  }
}
