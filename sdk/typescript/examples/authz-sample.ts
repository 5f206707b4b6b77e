/**
 * AuthZ sample: a small document-sharing graph
 *
 * DocUsers join Groups; users and groups can view Folders; folders pass their
 * viewers on to nested folders and to Documents.
 */

import {
    attribute,
    newEdge,
    newEdgeType,
    newObject,
    newObjectType,
    PlatformClient,
} from '../src';
import type {AuthzObject, Edge} from '../src';
import {runSample, SampleError} from './env';

export const DocUserObjectType = newObjectType('DocUser', '5d0c2a8e-3f61-4b7a-9e21-6c4f0d8b1a37');
export const GroupObjectType = newObjectType('Group', 'b81f4e96-0a2d-4c53-8f7e-2d9a6b3c5e10');
export const FolderObjectType = newObjectType('Folder', 'e4a7913c-6b58-4d0f-a2c1-7f3e8d9b0c64');
export const DocumentObjectType = newObjectType('Document', '0f9d2b7a-8c41-4e36-b5a9-3e1c7d6f2a85');

export const UserMemberOfGroupEdgeType = newEdgeType({
  id: '7c2e5a19-4d83-4f6b-a017-9b8e3c1d5f42',
  type_name: 'UserMemberOfGroup',
  source_object_type_id: DocUserObjectType.id,
  target_object_type_id: GroupObjectType.id,
  attributes: [attribute('view', { inherit: true })],
});

export const UserViewFolderEdgeType = newEdgeType({
  id: 'a93f0d6c-2b71-4e58-9c4a-1d7e6f8b3a20',
  type_name: 'UserViewFolder',
  source_object_type_id: DocUserObjectType.id,
  target_object_type_id: FolderObjectType.id,
  attributes: [attribute('view', { direct: true })],
});

export const GroupViewFolderEdgeType = newEdgeType({
  id: '3b6d8f2e-9a04-4c71-b3e5-5f2a0c7d9e18',
  type_name: 'GroupViewFolder',
  source_object_type_id: GroupObjectType.id,
  target_object_type_id: FolderObjectType.id,
  attributes: [attribute('view', { direct: true })],
});

export const FolderViewFolderEdgeType = newEdgeType({
  id: 'd15a7e3b-6c92-4f08-8a4d-2e9b1f6c0d73',
  type_name: 'FolderViewFolder',
  source_object_type_id: FolderObjectType.id,
  target_object_type_id: FolderObjectType.id,
  attributes: [attribute('view', { propagate: true })],
});

export const FolderViewDocEdgeType = newEdgeType({
  id: '86e4c0a2-1f57-4b39-9d6e-4a3c8b2f7e51',
  type_name: 'FolderViewDoc',
  source_object_type_id: FolderObjectType.id,
  target_object_type_id: DocumentObjectType.id,
  attributes: [attribute('view', { propagate: true })],
});

const OBJECT_TYPES = [DocUserObjectType, GroupObjectType, FolderObjectType, DocumentObjectType];

const EDGE_TYPES = [
  UserMemberOfGroupEdgeType,
  UserViewFolderEdgeType,
  GroupViewFolderEdgeType,
  FolderViewFolderEdgeType,
  FolderViewDocEdgeType,
];

async function setupAuthz(client: PlatformClient): Promise<void> {
  for (const objectType of OBJECT_TYPES) {
    await client.objectTypes.create(objectType, { ifNotExists: true });
  }
  for (const edgeType of EDGE_TYPES) {
    await client.edgeTypes.create(edgeType, { ifNotExists: true });
  }

  const objectTypeIds = new Set((await client.objectTypes.list()).map((ot) => ot.id));
  for (const objectType of OBJECT_TYPES) {
    if (!objectTypeIds.has(objectType.id)) {
      throw new SampleError(`setup failed: object type ${objectType.type_name} missing`);
    }
  }

  const edgeTypeIds = new Set((await client.edgeTypes.list()).map((et) => et.id));
  for (const edgeType of EDGE_TYPES) {
    if (!edgeTypeIds.has(edgeType.id)) {
      throw new SampleError(`setup failed: edge type ${edgeType.type_name} missing`);
    }
  }

  // not used below; shows the endpoint works
  await client.organizations.list();
}

async function expectView(
  client: PlatformClient,
  user: AuthzObject,
  target: AuthzObject,
  expected: boolean
): Promise<void> {
  const canView = await client.authz.checkAttribute(user.id, target.id, 'view');
  if (canView !== expected) {
    const verdict = expected ? 'cannot view' : 'can view';
    throw new SampleError(`${user.alias} ${verdict} ${target.alias} but should${expected ? '' : ' not'}`);
  }
}

async function checkAuthz(client: PlatformClient): Promise<void> {
  const originalObjectCount = (await client.objects.list()).length;
  const originalEdgeCount = (await client.edges.list()).length;

  const objects: AuthzObject[] = [];
  const edges: Edge[] = [];

  const createObject = async (typeId: string, alias: string): Promise<AuthzObject> => {
    const object = await client.objects.create(newObject(typeId, alias));
    objects.push(object);
    return object;
  };
  const connect = async (edgeTypeId: string, source: AuthzObject, target: AuthzObject): Promise<Edge> => {
    const edge = await client.edges.create(newEdge(edgeTypeId, source.id, target.id));
    edges.push(edge);
    return edge;
  };

  try {
    let user = await createObject(DocUserObjectType.id, 'user');
    user = await client.objects.get(user.id);
    const group = await createObject(GroupObjectType.id, 'group');
    const folder1 = await createObject(FolderObjectType.id, 'folder1');
    const folder2 = await createObject(FolderObjectType.id, 'folder2');
    const folder3 = await createObject(FolderObjectType.id, 'folder3');
    const doc1 = await createObject(DocumentObjectType.id, 'doc1');
    const doc2 = await createObject(DocumentObjectType.id, 'doc2');
    const doc3 = await createObject(DocumentObjectType.id, 'doc3');

    await connect(UserMemberOfGroupEdgeType.id, user, group);
    const userViewsFolder1 = await connect(UserViewFolderEdgeType.id, user, folder1);
    await client.edges.get(userViewsFolder1.id);
    await connect(FolderViewDocEdgeType.id, folder1, doc1);
    await connect(FolderViewFolderEdgeType.id, folder1, folder2);
    await connect(FolderViewDocEdgeType.id, folder2, doc2);
    await connect(FolderViewDocEdgeType.id, folder3, doc3);

    await expectView(client, user, folder1, true);
    await expectView(client, user, folder2, true);
    await expectView(client, user, doc1, true);
    await expectView(client, user, doc2, true);
    await expectView(client, user, doc3, false);

    // the group gains folder3, so its members gain doc3
    await connect(GroupViewFolderEdgeType.id, group, folder3);
    await expectView(client, user, doc3, true);
  } finally {
    for (const edge of edges) {
      await client.edges.delete(edge.id);
    }
    for (const object of objects) {
      await client.objects.delete(object.id);
    }
  }

  if ((await client.objects.list()).length !== originalObjectCount) {
    throw new SampleError('object count changed');
  }
  if ((await client.edges.list()).length !== originalEdgeCount) {
    throw new SampleError('edge count changed');
  }
}

async function cleanupAuthz(client: PlatformClient): Promise<void> {
  const userViewFolder = await client.edgeTypes.get(UserViewFolderEdgeType.id);
  await client.edgeTypes.delete(userViewFolder.id);
  for (const edgeType of EDGE_TYPES) {
    if (edgeType.id !== userViewFolder.id) {
      await client.edgeTypes.delete(edgeType.id);
    }
  }

  for (const objectType of OBJECT_TYPES) {
    await client.objectTypes.delete(objectType.id);
  }
}

export async function runAuthzSample(client: PlatformClient): Promise<void> {
  await setupAuthz(client);
  await checkAuthz(client);
  await cleanupAuthz(client);
  console.log('authz sample completed');
}

if (require.main === module) {
  runSample(runAuthzSample).catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
