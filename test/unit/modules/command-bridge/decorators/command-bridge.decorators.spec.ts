import 'reflect-metadata';
import { Reflector } from '@nestjs/core';
import {
  COMMAND_HANDLER_METADATA,
  CommandHandler,
  EXPOSED_MEMBERS_METADATA,
  EXPOSED_TYPE_METADATA,
  ExposedProperty,
  ExposedType,
  SerializedField,
  Types,
} from '@src/index';
import type { MemberDescriptor } from '@src/index';

describe('command bridge decorators', () => {
  const reflector = new Reflector();

  describe('@CommandHandler', () => {
    it('should store the handler name on the class', () => {
      @CommandHandler('sceneManage')
      class SceneHandler {}

      expect(reflector.get(COMMAND_HANDLER_METADATA, SceneHandler)).toBe('sceneManage');
    });
  });

  describe('@ExposedType', () => {
    it('should default the name to the class name', () => {
      @ExposedType()
      class Door {}

      expect(reflector.get(EXPOSED_TYPE_METADATA, Door)).toEqual({ name: 'Door', valueType: undefined });
    });

    it('should accept a name or options', () => {
      @ExposedType('Portal')
      class Gate {}

      @ExposedType({ name: 'Color', valueType: true })
      class Rgb {}

      expect(reflector.get(EXPOSED_TYPE_METADATA, Gate)).toEqual({ name: 'Portal', valueType: undefined });
      expect(reflector.get(EXPOSED_TYPE_METADATA, Rgb)).toEqual({ name: 'Color', valueType: true });
    });
  });

  describe('member decorators', () => {
    class Door {
      @ExposedProperty(Types.bool)
      open = false;

      @ExposedProperty(Types.string, { readonly: true })
      material = 'oak';

      @SerializedField(Types.int, { name: 'hinges' })
      private hingeCount = 2;

      @SerializedField(Types.string)
      private lockCode = 'test-code';
    }

    class SlidingDoor extends Door {
      @ExposedProperty(Types.float)
      travel = 1.2;

      @ExposedProperty(Types.bool, { readonly: true })
      open = false;
    }

    const membersOf = (ctor: new () => object): MemberDescriptor[] => reflector.get<MemberDescriptor[]>(EXPOSED_MEMBERS_METADATA, ctor);

    it('should record members in declaration order', () => {
      expect(membersOf(Door)).toEqual([
        { name: 'open', type: Types.bool, access: 'property', readonly: undefined },
        { name: 'material', type: Types.string, access: 'property', readonly: true },
        { name: 'hinges', key: 'hingeCount', type: Types.int, access: 'field', serialized: true, readonly: undefined },
        { name: 'lockCode', key: 'lockCode', type: Types.string, access: 'field', serialized: true, readonly: undefined },
      ]);
    });

    it('should extend inherited members without touching the base class', () => {
      expect(membersOf(SlidingDoor).map((member) => `${member.name}:${member.readonly === true}`)).toEqual([
        'material:true',
        'hinges:false',
        'lockCode:false',
        'travel:false',
        'open:true',
      ]);
      expect(membersOf(Door)).toHaveLength(4);
    });
  });
});
