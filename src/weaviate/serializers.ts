/**
 * Tracker records → AgiraObject properties.
 *
 * Records arrive as plain JSON-like objects (ids may be numbers or strings,
 * timestamps Date or ISO strings). Each kind has its own text layout so that
 * status and risk metadata are searchable alongside the body.
 */

type Id = string | number;
type Timestamp = Date | string;

export interface ItemRecord {
  kind: 'item';
  id: Id;
  project_id?: Id | null;
  organisation_id?: Id | null;
  title?: string | null;
  description?: string | null;
  solution_description?: string | null;
  status?: string | null;
  created_at?: Timestamp | null;
  updated_at?: Timestamp | null;
}

export interface CommentRecord {
  kind: 'comment';
  id: Id;
  item_id?: Id | null;
  item_title?: string | null;
  project_id?: Id | null;
  organisation_id?: Id | null;
  subject?: string | null;
  body?: string | null;
  comment_kind?: string | null;
  delivery_status?: string | null;
  created_at?: Timestamp | null;
}

export interface AttachmentRecord {
  kind: 'attachment';
  id: Id;
  original_name?: string | null;
  content_type?: string | null;
  size_bytes?: number | null;
  sha256?: string | null;
  /** Objects the attachment is linked to; the first one is its parent. */
  links?: Array<{ target_object_id: Id; project_id?: Id | null; organisation_id?: Id | null }>;
  created_at?: Timestamp | null;
}

export interface ProjectRecord {
  kind: 'project';
  id: Id;
  name?: string | null;
  description?: string | null;
  status?: string | null;
}

export interface ChangeRecord {
  kind: 'change';
  id: Id;
  project_id?: Id | null;
  title?: string | null;
  description?: string | null;
  status?: string | null;
  risk?: string | null;
  rollback_plan?: string | null;
  created_at?: Timestamp | null;
  updated_at?: Timestamp | null;
}

export interface NodeRecord {
  kind: 'node';
  id: Id;
  project_id?: Id | null;
  name?: string | null;
  description?: string | null;
  type?: string | null;
  parent_node_id?: Id | null;
}

export interface ReleaseRecord {
  kind: 'release';
  id: Id;
  project_id?: Id | null;
  name?: string | null;
  version?: string | null;
  status?: string | null;
  risk?: string | null;
  risk_description?: string | null;
  risk_mitigation?: string | null;
  rescue_measure?: string | null;
  update_date?: Timestamp | null;
}

export interface GithubMappingRecord {
  kind: 'github_mapping';
  id: Id;
  mapping_kind: 'Issue' | 'PR';
  number: number;
  state?: string | null;
  html_url?: string | null;
  item_id?: Id | null;
  item_title?: string | null;
  item_description?: string | null;
  project_id?: Id | null;
  organisation_id?: Id | null;
  github_owner?: string | null;
  github_repo?: string | null;
  last_synced_at?: Timestamp | null;
}

export type TrackerRecord =
  | ItemRecord
  | CommentRecord
  | AttachmentRecord
  | ProjectRecord
  | ChangeRecord
  | NodeRecord
  | ReleaseRecord
  | GithubMappingRecord;

export type AgiraObjectType =
  | 'item'
  | 'comment'
  | 'attachment'
  | 'project'
  | 'change'
  | 'node'
  | 'release'
  | 'github_issue'
  | 'github_pr';

export interface AgiraObject {
  type: AgiraObjectType;
  object_id: string;
  project_id: string | null;
  org_id: string | null;
  title: string;
  text: string;
  status: string | null;
  url: string;
  source_system: 'agira' | 'github';
  parent_object_id: string | null;
  external_key: string | null;
  mime_type: string | null;
  size_bytes: number | null;
  sha256: string | null;
  created_at: Date;
  updated_at: Date;
}

const idOrNull = (id: Id | null | undefined): string | null =>
  id === null || id === undefined || id === '' ? null : String(id);

function toDate(value: Timestamp | null | undefined, fallback: () => Date): Date {
  if (value instanceof Date) return value;
  if (value) {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) return parsed;
  }
  return fallback();
}

function baseObject(type: AgiraObjectType, id: Id, now: () => Date): AgiraObject {
  return {
    type,
    object_id: String(id),
    project_id: null,
    org_id: null,
    title: '',
    text: '',
    status: null,
    url: '',
    source_system: 'agira',
    parent_object_id: null,
    external_key: null,
    mime_type: null,
    size_bytes: null,
    sha256: null,
    created_at: now(),
    updated_at: now(),
  };
}

function serializeItem(item: ItemRecord, now: () => Date): AgiraObject {
  const parts: string[] = [];
  if (item.description) parts.push(item.description);
  if (item.solution_description) parts.push(`\n\nSolution:\n${item.solution_description}`);
  let text = parts.join('\n');
  if (item.status) text = `Status: ${item.status}\n\n${text}`;

  return {
    ...baseObject('item', item.id, now),
    project_id: idOrNull(item.project_id),
    org_id: idOrNull(item.organisation_id),
    title: item.title ?? '',
    text,
    status: item.status ?? null,
    url: `/items/${item.id}/`,
    created_at: toDate(item.created_at, now),
    updated_at: toDate(item.updated_at, now),
  };
}

function serializeComment(comment: CommentRecord, now: () => Date): AgiraObject {
  let title = comment.subject || `Comment on ${comment.item_title ?? ''}`;
  if (title.length > 100) title = title.slice(0, 97) + '...';

  let text = comment.body ?? '';
  if (comment.comment_kind) text = `Type: ${comment.comment_kind}\n\n${text}`;

  const createdAt = toDate(comment.created_at, now);
  return {
    ...baseObject('comment', comment.id, now),
    project_id: idOrNull(comment.project_id),
    org_id: idOrNull(comment.organisation_id),
    title,
    text,
    status: comment.delivery_status ?? null,
    url: `/items/${comment.item_id ?? ''}/`,
    parent_object_id: idOrNull(comment.item_id),
    created_at: createdAt,
    updated_at: createdAt,
  };
}

function serializeAttachment(attachment: AttachmentRecord, now: () => Date): AgiraObject {
  const firstLink = attachment.links?.[0];

  let text = `Attachment: ${attachment.original_name ?? ''}`;
  if (attachment.content_type) text += ` (${attachment.content_type})`;
  if (attachment.size_bytes) text += `\nSize: ${attachment.size_bytes} bytes`;

  const createdAt = toDate(attachment.created_at, now);
  return {
    ...baseObject('attachment', attachment.id, now),
    project_id: idOrNull(firstLink?.project_id),
    org_id: idOrNull(firstLink?.organisation_id),
    title: attachment.original_name || 'Unnamed Attachment',
    text,
    url: `/attachments/${attachment.id}/`,
    parent_object_id: idOrNull(firstLink?.target_object_id),
    mime_type: attachment.content_type || null,
    size_bytes: attachment.size_bytes ? Math.trunc(attachment.size_bytes) : null,
    sha256: attachment.sha256 || null,
    created_at: createdAt,
    updated_at: createdAt,
  };
}

function serializeProject(project: ProjectRecord, now: () => Date): AgiraObject {
  let text = project.description ?? '';
  if (project.status) text = `Status: ${project.status}\n\n${text}`;

  return {
    ...baseObject('project', project.id, now),
    project_id: String(project.id),
    title: project.name ?? '',
    text,
    status: project.status ?? null,
    url: `/projects/${project.id}/`,
  };
}

function serializeChange(change: ChangeRecord, now: () => Date): AgiraObject {
  let text = change.description ?? '';
  const header: string[] = [];
  if (change.status) header.push(`Status: ${change.status}`);
  if (change.risk) header.push(`Risk: ${change.risk}`);
  if (header.length > 0) text = header.join('\n') + '\n\n' + text;
  if (change.rollback_plan) text += `\n\nRollback Plan:\n${change.rollback_plan}`;

  return {
    ...baseObject('change', change.id, now),
    project_id: idOrNull(change.project_id),
    title: change.title ?? '',
    text,
    status: change.status ?? null,
    url: `/changes/${change.id}/`,
    created_at: toDate(change.created_at, now),
    updated_at: toDate(change.updated_at, now),
  };
}

function serializeNode(node: NodeRecord, now: () => Date): AgiraObject {
  let text = node.description ?? '';
  if (node.type) text = `Type: ${node.type}\n\n${text}`;

  return {
    ...baseObject('node', node.id, now),
    project_id: idOrNull(node.project_id),
    title: node.name ?? '',
    text,
    url: `/nodes/${node.id}/`,
    parent_object_id: idOrNull(node.parent_node_id),
  };
}

function serializeRelease(release: ReleaseRecord, now: () => Date): AgiraObject {
  const parts: string[] = [];
  if (release.risk_description) parts.push(`Risk Description:\n${release.risk_description}`);
  if (release.risk_mitigation) parts.push(`\nRisk Mitigation:\n${release.risk_mitigation}`);
  if (release.rescue_measure) parts.push(`\nRescue Measure:\n${release.rescue_measure}`);
  let text = parts.join('\n');

  const header: string[] = [];
  if (release.version) header.push(`Version: ${release.version}`);
  if (release.status) header.push(`Status: ${release.status}`);
  if (release.risk) header.push(`Risk: ${release.risk}`);
  if (header.length > 0) text = header.join('\n') + '\n\n' + text;

  const updated = toDate(release.update_date, now);
  return {
    ...baseObject('release', release.id, now),
    project_id: idOrNull(release.project_id),
    title: release.name || release.version || '',
    text,
    status: release.status ?? null,
    url: `/releases/${release.id}/`,
    created_at: updated,
    updated_at: updated,
  };
}

function serializeGithubMapping(mapping: GithubMappingRecord, now: () => Date): AgiraObject {
  const type: AgiraObjectType = mapping.mapping_kind === 'PR' ? 'github_pr' : 'github_issue';
  const hasItem = mapping.item_id !== null && mapping.item_id !== undefined;

  const externalKey =
    mapping.github_owner && mapping.github_repo
      ? `${mapping.github_owner}/${mapping.github_repo}#${mapping.number}`
      : null;

  let text = hasItem ? (mapping.item_description ?? '') : '';
  if (mapping.state) text = `State: ${mapping.state}\n\n${text}`;

  return {
    ...baseObject(type, mapping.id, now),
    project_id: idOrNull(mapping.project_id),
    org_id: idOrNull(mapping.organisation_id),
    title: hasItem ? (mapping.item_title ?? '') : `GitHub ${mapping.mapping_kind} #${mapping.number}`,
    text,
    status: mapping.state ?? null,
    url: mapping.html_url || `/items/${mapping.item_id ?? ''}/`,
    source_system: 'github',
    external_key: externalKey,
    updated_at: toDate(mapping.last_synced_at, now),
  };
}

/**
 * Serialize a tracker record into the AgiraObject stored in the vector index.
 * Kinds without their own timestamps use `now()`.
 */
export function toAgiraObject(record: TrackerRecord, now: () => Date = () => new Date()): AgiraObject {
  switch (record.kind) {
    case 'item':
      return serializeItem(record, now);
    case 'comment':
      return serializeComment(record, now);
    case 'attachment':
      return serializeAttachment(record, now);
    case 'project':
      return serializeProject(record, now);
    case 'change':
      return serializeChange(record, now);
    case 'node':
      return serializeNode(record, now);
    case 'release':
      return serializeRelease(record, now);
    case 'github_mapping':
      return serializeGithubMapping(record, now);
  }
}
