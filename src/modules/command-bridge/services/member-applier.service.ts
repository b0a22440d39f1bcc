import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { describeError } from '../errors';
import {
  ASSET_RESOLVER,
  AssetResolver,
  CompositeTypeDescriptor,
  DynamicMapping,
  LIVE_OBJECT_RESOLVER,
  LiveObjectResolver,
  MemberApplyOutcome,
  MemberApplyResult,
  MemberDescriptor,
  TYPE_RESOLVER,
  TypeResolver,
} from '../interfaces';
import { buildMemberTable, describeValue, isVisibleMember, storageKey } from '../utils';
import { ValueConverterService } from './value-converter.service';

/**
 * Writes coerced values onto named members of live objects.
 *
 * Lookup per name: a writable property, then a field marked serialized.
 * Unmarked fields stay invisible. Nothing is assigned when conversion or
 * the setter fails.
 */
@Injectable()
export class MemberApplierService {
  private readonly logger = new Logger(MemberApplierService.name);

  constructor(
    private readonly converter: ValueConverterService,
    @Inject(TYPE_RESOLVER) private readonly types: TypeResolver,
    @Optional()
    @Inject(LIVE_OBJECT_RESOLVER)
    private readonly liveObjects?: LiveObjectResolver,
    @Optional()
    @Inject(ASSET_RESOLVER)
    private readonly assets?: AssetResolver,
  ) {}

  /**
   * Member table of a target: its class descriptor, or the type name its
   * resolver reports for it
   */
  describeType(target: object): CompositeTypeDescriptor | undefined {
    const described = this.types.describeInstance(target);
    if (described) {
      return described;
    }
    const typeName = this.liveObjects?.describe(target)?.typeName ?? this.assets?.describe(target)?.typeName;
    return typeName ? this.types.tryResolve(typeName) : undefined;
  }

  applyMember(target: object, name: string, raw: unknown): MemberApplyOutcome {
    const type = this.describeType(target);
    if (!type) {
      return { status: 'unsupported', member: name, message: `Type ${describeValue(target)} does not expose any members` };
    }

    const slot = buildMemberTable(type).get(name);
    const property = slot?.property;
    const field = slot?.field;

    if (property && !property.readonly) {
      return this.assign(target, type, property, raw);
    }

    if (field && !field.serialized) {
      this.logger.warn(`Field '${name}' on ${type.name} is not marked serialized and cannot be set`);
    } else if (field && !field.readonly) {
      return this.assign(target, type, field, raw);
    }

    if (property?.readonly || (field?.serialized && field.readonly)) {
      return { status: 'unsupported', member: name, message: `Member '${name}' on type ${type.name} is read-only` };
    }

    return { status: 'not-found', member: name, message: `Member '${name}' not found on type ${type.name}` };
  }

  /**
   * Applies every change independently
   */
  applyMembers(target: object, changes: DynamicMapping): MemberApplyResult {
    const updated: string[] = [];
    const failed: Record<string, string> = {};

    for (const [name, raw] of Object.entries(changes)) {
      const outcome = this.applyMember(target, name, raw);
      if (outcome.status === 'ok') {
        if (!updated.includes(name)) {
          updated.push(name);
        }
      } else {
        failed[name] = outcome.message;
      }
    }

    const failedCount = Object.keys(failed).length;
    return {
      updated,
      failed,
      partialSuccess: updated.length > 0 && failedCount > 0,
      allSucceeded: failedCount === 0,
    };
  }

  /**
   * Serialized values of the visible members, or of `names` where given.
   * Names that are not visible members are left out.
   */
  readMembers(target: object, names?: readonly string[]): DynamicMapping {
    const type = this.describeType(target);
    if (!type) {
      return {};
    }

    const table = buildMemberTable(type);
    const wanted = names ?? Array.from(table.keys());
    const values: DynamicMapping = {};

    for (const name of wanted) {
      const slot = table.get(name);
      const member = slot?.property ?? (slot?.field && isVisibleMember(slot.field) ? slot.field : undefined);
      if (!member) {
        continue;
      }
      values[name] = this.converter.serialize(Reflect.get(target, storageKey(member)));
    }
    return values;
  }

  private assign(target: object, type: CompositeTypeDescriptor, member: MemberDescriptor, raw: unknown): MemberApplyOutcome {
    const outcome = this.converter.tryConvert(raw, member.type);
    if (!outcome.ok) {
      return { status: 'failed', member: member.name, message: `Failed to convert '${member.name}': ${outcome.error.message}` };
    }

    try {
      if (!Reflect.set(target, storageKey(member), outcome.value)) {
        return { status: 'failed', member: member.name, message: `Member '${member.name}' on type ${type.name} could not be assigned` };
      }
    } catch (error: unknown) {
      return { status: 'failed', member: member.name, message: `Failed to set '${member.name}': ${describeError(error)}` };
    }

    this.logger.debug(`Set ${type.name}.${member.name}`);
    return { status: 'ok', member: member.name, value: outcome.value };
  }
}
