import 'reflect-metadata';
import { Types, defaultValueFor, describeType } from '@src/index';
import { buildMemberTable, createDefaultInstance, isVisibleMember, isWritableMember, satisfiesType } from '@modules/command-bridge/utils';
import { CrateType, LightMode, Vector3, Vector3Type } from '../../../../fixtures/scene.fixtures';

describe('type descriptor utils', () => {
  describe('describeType', () => {
    it('should name every descriptor kind', () => {
      expect(describeType(Types.int)).toBe('int');
      expect(describeType(LightMode)).toBe('LightMode');
      expect(describeType(Types.reference('Camera'))).toBe('Reference<Camera>');
      expect(describeType(Types.list(Types.string))).toBe('List<string>');
      expect(describeType(Types.set())).toBe('Set<unknown>');
      expect(describeType(Types.array(Types.int))).toBe('Array<int>');
      expect(describeType(Vector3Type)).toBe('Vector3');
    });
  });

  describe('defaultValueFor', () => {
    it('should give 0 for numeric kinds and false for bool', () => {
      expect(defaultValueFor(Types.int)).toBe(0);
      expect(defaultValueFor(Types.double)).toBe(0);
      expect(defaultValueFor(Types.byte)).toBe(0);
      expect(defaultValueFor(Types.bool)).toBe(false);
    });

    it('should give 0 for enumerations', () => {
      expect(defaultValueFor(LightMode)).toBe(0);
    });

    it('should give null for strings, references, sequences and reference composites', () => {
      expect(defaultValueFor(Types.string)).toBeNull();
      expect(defaultValueFor(Types.reference('Camera'))).toBeNull();
      expect(defaultValueFor(Types.list(Types.int))).toBeNull();
      expect(defaultValueFor(CrateType)).toBeNull();
    });

    it('should give a default-initialised instance for value-type composites', () => {
      const value = defaultValueFor(Vector3Type);
      expect(value).toBeInstanceOf(Vector3);
      expect(value).toEqual({ x: 0, y: 0, z: 0 });
    });
  });

  describe('createDefaultInstance', () => {
    it('should fill writable members the factory left undefined', () => {
      const type = Types.composite('Pair', [
        { name: 'left', type: Types.int, access: 'property' },
        { name: 'right', type: Types.bool, access: 'property' },
      ]);
      expect(createDefaultInstance(type)).toEqual({ left: 0, right: false });
    });
  });

  describe('member visibility', () => {
    it('should treat properties as visible and unmarked fields as invisible', () => {
      const [weight, , secret, serial] = CrateType.members;
      expect(isVisibleMember(weight)).toBe(true);
      expect(isVisibleMember(secret)).toBe(false);
      expect(isVisibleMember(serial)).toBe(true);
      expect(isWritableMember(serial)).toBe(false);
    });

    it('should build a cached name to slot table', () => {
      const table = buildMemberTable(CrateType);
      expect(table.get('weight')?.property?.name).toBe('weight');
      expect(table.get('secret')?.field?.access).toBe('field');
      expect(table.has('missing')).toBe(false);
      expect(buildMemberTable(CrateType)).toBe(table);
    });
  });

  describe('satisfiesType', () => {
    it('should range-check integral kinds', () => {
      expect(satisfiesType(255, Types.byte)).toBe(true);
      expect(satisfiesType(256, Types.byte)).toBe(false);
      expect(satisfiesType(-1, Types.byte)).toBe(false);
      expect(satisfiesType(2147483647, Types.int)).toBe(true);
      expect(satisfiesType(2147483648, Types.int)).toBe(false);
      expect(satisfiesType(1.5, Types.int)).toBe(false);
      expect(satisfiesType(1.5, Types.float)).toBe(true);
    });

    it('should accept integers for enumerations', () => {
      expect(satisfiesType(99, LightMode)).toBe(true);
      expect(satisfiesType('Baked', LightMode)).toBe(false);
    });

    it('should check sequence containers and elements', () => {
      expect(satisfiesType(['a', 'b'], Types.list(Types.string))).toBe(true);
      expect(satisfiesType(['a', 1], Types.list(Types.string))).toBe(false);
      expect(satisfiesType(new Set([1]), Types.set(Types.int))).toBe(true);
      expect(satisfiesType([1], Types.set(Types.int))).toBe(false);
      expect(satisfiesType([], Types.list())).toBe(true);
    });

    it('should check composite instances by class', () => {
      expect(satisfiesType(new Vector3(), Vector3Type)).toBe(true);
      expect(satisfiesType({ x: 1, y: 2, z: 3 }, Vector3Type)).toBe(false);
    });

    it('should check class-less composites by exact member set', () => {
      const type = Types.composite('Pair', [
        { name: 'left', type: Types.int, access: 'property' },
        { name: 'right', type: Types.int, access: 'property' },
      ]);
      expect(satisfiesType({ left: 1, right: 2 }, type)).toBe(true);
      expect(satisfiesType({ left: 1 }, type)).toBe(false);
      expect(satisfiesType({ left: 1, right: 'two' }, type)).toBe(false);
    });

    it('should reject plain descriptors for references unless they are live objects', () => {
      const reference = Types.reference('Crate');
      const crate = { weight: 1 };
      expect(satisfiesType({ $ref: 'Root/A' }, reference)).toBe(false);
      expect(satisfiesType(crate, reference, { isLiveObject: (value) => value === crate })).toBe(true);
    });

    it('should pass opaque values through unless a decoder or guard is given', () => {
      expect(satisfiesType({ any: 'thing' }, Types.opaque('Blob'))).toBe(true);
      expect(satisfiesType('x', Types.opaque('Color', { decode: () => 'decoded' }))).toBe(false);
      expect(satisfiesType('#fff', Types.opaque('Color', { is: (value) => typeof value === 'string' }))).toBe(true);
    });
  });
});
