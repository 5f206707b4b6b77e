import {
    AccessPolicyOpen,
    attribute,
    ColumnIndexType,
    DataType,
    DecodeError,
    describeResourceID,
    matchesResource,
    NIL_UUID,
    newAccessPolicy,
    newColumn,
    newEdgeType,
    newObject,
    newObjectType,
    newTransformer,
    parseAccessorRows,
    PolicyType,
    policyComponent,
    resourceById,
    TransformType,
} from '../src';
import {decodeOptionalResourceID, decodeResourceID} from '../src/models/common';
import {decodeAccessPolicyComponent, decodeTransformer} from '../src/models/tokenizer';
import {decodeAccessor, decodeColumn} from '../src/models/userstore';
import {decodeEdgeType, decodeObject} from '../src/models/authz';

const ID = '6c1b9f3e-2a47-4d85-b0e6-8f4a1c7d2e93';

describe('ResourceID', () => {
  it('should prefer a non-nil id over the name', () => {
    expect(decodeResourceID({ id: ID, name: 'AllowAll' })).toEqual({ id: ID });
  });

  it('should fall back to the name when the id is nil', () => {
    expect(decodeResourceID({ id: NIL_UUID, name: 'AllowAll' })).toEqual({ name: 'AllowAll' });
  });

  it('should keep a nil id when there is no name', () => {
    expect(decodeResourceID({ id: NIL_UUID, name: '' })).toEqual({ id: NIL_UUID });
  });

  it('should reject a reference with neither handle', () => {
    expect(() => decodeResourceID({})).toThrow(DecodeError);
  });

  it('should treat an unset optional reference as absent', () => {
    expect(decodeOptionalResourceID({ ref: { id: NIL_UUID } }, 'ref')).toBeUndefined();
    expect(decodeOptionalResourceID({ ref: null }, 'ref')).toBeUndefined();
    expect(decodeOptionalResourceID({ ref: { id: ID } }, 'ref')).toEqual({ id: ID });
  });

  it('should describe itself', () => {
    expect(describeResourceID(resourceById(ID))).toBe(`ResourceID(${ID})`);
    expect(describeResourceID(AccessPolicyOpen)).toBe('ResourceID(AllowAll)');
  });

  it('should match records by id or name', () => {
    expect(matchesResource({ id: ID, name: 'AllowAll' }, AccessPolicyOpen)).toBe(true);
    expect(matchesResource({ id: ID, name: 'Other' }, resourceById(ID))).toBe(true);
    expect(matchesResource({ id: NIL_UUID, name: 'Other' }, AccessPolicyOpen)).toBe(false);
  });
});

describe('constructors', () => {
  it('should default a new column', () => {
    expect(newColumn({ name: 'email', type: DataType.EMAIL })).toEqual({
      id: NIL_UUID,
      name: 'email',
      type: 'email',
      is_array: false,
      default_value: '',
      index_type: ColumnIndexType.NONE,
    });
  });

  it('should default the transformer output type to its input type', () => {
    const transformer = newTransformer({
      name: 'passthrough',
      input_type: DataType.STRING,
      transform_type: TransformType.PASSTHROUGH,
      function: '',
    });

    expect(transformer.output_type).toBe(DataType.STRING);
    expect(transformer.reuse_existing_token).toBe(false);
    expect(transformer.parameters).toBe('');
  });

  it('should copy component lists', () => {
    const components = [policyComponent(AccessPolicyOpen)];
    const policy = newAccessPolicy({ name: 'p', policy_type: PolicyType.COMPOSITE_OR, components });

    components.push(policyComponent(resourceById(ID)));

    expect(policy.components).toHaveLength(1);
    expect(policy.version).toBe(0);
  });

  it('should give AuthZ records fresh random ids', () => {
    const first = newObjectType('Document');
    const second = newObjectType('Document');

    expect(first.id).not.toBe(second.id);
    expect(first.id).not.toBe(NIL_UUID);
    expect(newObject(first.id)).not.toHaveProperty('alias');
  });

  it('should fill attribute flags', () => {
    expect(attribute('view', { inherit: true })).toEqual({
      name: 'view',
      direct: false,
      inherit: true,
      propagate: false,
    });
  });

  it('should keep a chosen edge type id', () => {
    const edgeType = newEdgeType({
      id: ID,
      type_name: 'FolderViewDoc',
      source_object_type_id: NIL_UUID,
      target_object_type_id: NIL_UUID,
      attributes: [],
    });

    expect(edgeType.id).toBe(ID);
  });
});

describe('decoders', () => {
  it('should read a missing alias as null', () => {
    expect(decodeObject({ id: ID, type_id: ID })).toEqual({ id: ID, type_id: ID, alias: null });
  });

  it('should read null edge type attributes as empty', () => {
    const edgeType = decodeEdgeType({
      id: ID,
      type_name: 'UserMemberOfGroup',
      source_object_type_id: ID,
      target_object_type_id: ID,
      attributes: null,
      organization_id: NIL_UUID,
    });

    expect(edgeType.attributes).toEqual([]);
    expect(edgeType.organization_id).toBe(NIL_UUID);
  });

  it('should decode an accessor and drop an unset token policy', () => {
    const accessor = decodeAccessor({
      id: ID,
      name: 'AccessorForEmail',
      description: 'email lookup',
      columns: [{ column: { name: 'email' }, transformer: { id: NIL_UUID, name: 'PassthroughUnchangedData' } }],
      access_policy: { name: 'AllowAll' },
      token_access_policy: { id: NIL_UUID },
      selector_config: { where_clause: '{email} = ?' },
      purposes: [{ name: 'operational' }],
      data_life_cycle_state: '',
      version: 3,
    });

    expect(accessor).toEqual({
      id: ID,
      name: 'AccessorForEmail',
      description: 'email lookup',
      columns: [{ column: { name: 'email' }, transformer: { name: 'PassthroughUnchangedData' } }],
      access_policy: { name: 'AllowAll' },
      selector_config: { where_clause: '{email} = ?' },
      purposes: [{ name: 'operational' }],
      version: 3,
    });
  });

  it('should keep a life cycle state it does not know', () => {
    const accessor = decodeAccessor({
      id: ID,
      name: 'a',
      columns: [],
      access_policy: { name: 'AllowAll' },
      selector_config: { where_clause: '' },
      purposes: [],
      data_life_cycle_state: 'archived',
      version: 0,
    });

    expect(accessor.data_life_cycle_state).toBe('archived');
  });

  it('should keep column and transformer types it does not know', () => {
    const column = decodeColumn({
      id: ID,
      name: 'mailing_address',
      type: 'canonical_address',
      is_array: false,
      index_type: 'hashed',
    });
    const transformer = decodeTransformer({
      id: ID,
      name: 'Masker',
      input_type: 'string',
      output_type: 'masked_string',
      reuse_existing_token: false,
      transform_type: 'mask',
      function: 'function transform(data) { return data; }',
    });

    expect(column.type).toBe('canonical_address');
    expect(column.index_type).toBe('hashed');
    expect(transformer.output_type).toBe('masked_string');
    expect(transformer.transform_type).toBe('mask');
  });

  it('should decode a template component sent beside an unset policy', () => {
    const component = decodeAccessPolicyComponent({
      policy: { id: NIL_UUID, name: '' },
      template: { id: ID, name: 'PIIAccessPolicyTemplate' },
      template_parameters: '{"team":"support"}',
    });

    expect(component).toEqual({ template: { id: ID }, template_parameters: '{"team":"support"}' });
  });

  it('should decode a policy component', () => {
    expect(decodeAccessPolicyComponent({ policy: { id: NIL_UUID, name: 'AllowAll' } })).toEqual({
      policy: { name: 'AllowAll' },
    });
  });

  it('should parse accessor rows', () => {
    expect(parseAccessorRows({ data: ['{"phone":"+15555550100","n":2}'] })).toEqual([
      { phone: '+15555550100', n: 2 },
    ]);
  });

  it('should reject accessor rows that are not JSON objects', () => {
    expect(() => parseAccessorRows({ data: ['not json'] })).toThrow(DecodeError);
    expect(() => parseAccessorRows({ data: ['[1]'] })).toThrow(DecodeError);
  });
});
