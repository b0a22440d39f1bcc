import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { TargetNotFoundError, TypeCatalogService, ValidationError } from '@src/index';
import { CrateType, Light, SpotLight } from '../../../../fixtures/scene.fixtures';

describe('TypeCatalogService', () => {
  let catalog: TypeCatalogService;

  beforeEach(() => {
    catalog = new TypeCatalogService(new Reflector());
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
  });

  describe('registerClass', () => {
    it('should build a descriptor from decorator metadata', () => {
      const descriptor = catalog.registerClass(Light);

      expect(descriptor.name).toBe('Light');
      expect(descriptor.members.map((member) => member.name)).toEqual([
        'intensity',
        'range',
        'enabled',
        'label',
        'mode',
        'layers',
        'offset',
        'tags',
        'target',
        'kind',
        'shadowStrength',
      ]);
      expect(descriptor.create?.()).toBeInstanceOf(Light);
    });

    it('should describe serialized fields with their storage key', () => {
      const field = catalog.registerClass(Light).members.find((member) => member.name === 'shadowStrength');
      expect(field).toMatchObject({ key: '_shadowStrength', access: 'field', serialized: true });
    });

    it('should name undecorated subclasses after their own class', () => {
      class PointLight extends Light {}
      const seeded = new TypeCatalogService(new Reflector(), { exposedTypes: [Light, PointLight] });

      expect(seeded.tryResolve('Light')?.ctor).toBe(Light);
      expect(seeded.tryResolve('PointLight')?.ctor).toBe(PointLight);
      expect(seeded.tryResolve('PointLight')?.members).toHaveLength(11);
    });

    it('should register a class only once', () => {
      expect(catalog.registerClass(Light)).toBe(catalog.registerClass(Light));
    });

    it('should inherit members from decorated base classes', () => {
      const descriptor = catalog.registerClass(SpotLight);

      expect(descriptor.name).toBe('SpotLight');
      expect(descriptor.members).toHaveLength(12);
      expect(descriptor.members[11].name).toBe('angle');
      expect(catalog.registerClass(Light).members).toHaveLength(11);
    });
  });

  describe('registerType', () => {
    it('should reject empty names', () => {
      expect(() => catalog.registerType({ ...CrateType, name: '' })).toThrow(ValidationError);
    });

    it('should warn and overwrite duplicates', () => {
      const warnSpy = jest.spyOn(Logger.prototype, 'warn');
      const replacement = { ...CrateType, members: [] };

      catalog.registerType(CrateType);
      catalog.registerType(replacement);

      expect(warnSpy).toHaveBeenCalledWith("Type 'Crate' is already registered. Overwriting...");
      expect(catalog.resolve('Crate')).toBe(replacement);
    });
  });

  describe('lookup', () => {
    beforeEach(() => {
      catalog.registerClass(Light);
      catalog.registerType(CrateType);
    });

    it('should resolve registered names', () => {
      expect(catalog.exists('Crate')).toBe(true);
      expect(catalog.tryResolve('Missing')).toBeUndefined();
      expect(catalog.resolveMany('Light', 'Missing', 'Crate').map((type) => type.name)).toEqual(['Light', 'Crate']);
      expect(catalog.listTypes()).toEqual(['Light', 'Crate']);
    });

    it('should throw for unknown names', () => {
      expect(() => catalog.resolve('Missing')).toThrow(TargetNotFoundError);
      expect(() => catalog.resolve('Missing')).toThrow("Type 'Missing' not found");
    });

    it('should describe instances through the nearest registered ancestor', () => {
      expect(catalog.describeInstance(new SpotLight())?.name).toBe('Light');

      catalog.registerClass(SpotLight);
      expect(catalog.describeInstance(new SpotLight())?.name).toBe('SpotLight');
    });

    it('should not describe plain objects', () => {
      expect(catalog.describeInstance({ weight: 1 })).toBeUndefined();
    });
  });

  it('should seed exposed types from options', () => {
    const seeded = new TypeCatalogService(new Reflector(), { exposedTypes: [Light, CrateType] });
    expect(seeded.listTypes()).toEqual(['Light', 'Crate']);
  });
});
