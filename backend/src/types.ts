// Shared types for the backend

import type { IRequest } from 'itty-router';

export type UserRole = 'member' | 'editor' | 'admin' | 'chair';

export const USER_ROLES: readonly UserRole[] = ['member', 'editor', 'admin', 'chair'];

export type LoginType = 'email' | 'oauth' | 'wallet';

export interface User {
  id: string;
  email?: string;
  name?: string; // Explicit display name chosen by the user
  oauthName?: string; // Name supplied by the OAuth provider
  walletAddress?: string;
  loginType: LoginType;
  role: UserRole;
  active: boolean; // Users are deactivated, never deleted
  createdAt: string;
  updatedAt: string;
  displayNameSetAt?: string;
}

export type WorkingGroupState = 'active' | 'concluded';

export const WORKING_GROUP_STATES: readonly WorkingGroupState[] = ['active', 'concluded'];

export interface WorkingGroup {
  acronym: string; // Lower-case key that submissions name, e.g. ops
  name: string;
  chairs: string[];
  state: WorkingGroupState; // Concluded groups accept no new submissions
  createdAt: string;
  updatedAt: string;
}

export interface WorkingGroupInput {
  acronym?: string;
  name?: string;
  chairs?: string[] | string;
}

export type SubmissionStatus = 'submitted' | 'under_review' | 'approved' | 'rejected';

export interface DraftInput {
  title?: string;
  authors?: string[] | string;
  workingGroup?: string;
  fileRef?: string;
  abstract?: string;
  resubmissionOf?: string; // Earlier terminal submission this one reconsiders
}

export interface Submission {
  id: string;
  title: string;
  authors: string[];
  workingGroup: string; // Acronym of a registered working group
  fileRef: string;
  abstract?: string;
  draftName: string;
  status: SubmissionStatus;
  submittedBy: string;
  submittedAt: string;
  resubmissionOf?: string;
  documentIdentifier?: string; // Set once approved
  revisionNumber?: number; // Revision created by the approval
  reviewedBy?: string;
  rejectionReason?: string;
  updatedAt: string;
}

export type DocumentStatus = 'published' | 'superseded';

export interface PublishedDocument {
  identifier: string; // e.g. ML-001, immutable
  number: number;
  title: string;
  workingGroup: string;
  status: DocumentStatus;
  currentRevision: number;
  supersededBy?: string;
  createdAt: string;
  updatedAt: string;
}

export interface DocumentRevision {
  identifier: string; // e.g. ML-001-02
  documentIdentifier: string;
  revision: number;
  submissionId: string;
  title: string;
  authors: string[];
  fileRef: string;
  abstract?: string;
  createdBy: string;
  createdAt: string;
}

export interface DocumentComment {
  id: string;
  documentIdentifier: string;
  parentId?: string; // Back-reference only, fixed at creation
  authorId: string;
  authorName: string;
  body: string; // Placeholder once deleted
  originalText?: string; // First body, kept after edit or delete
  createdAt: string;
  editedAt?: string;
  isDeleted: boolean;
  deletedAt?: string;
  likeCount: number;
}

export interface CommentNode {
  comment: DocumentComment;
  children: CommentNode[];
}

export interface ThreadEntry {
  comment: DocumentComment;
  depth: number;
}

export type NotificationLevel = 'all' | 'significant' | 'major' | 'comments' | 'none';

export const NOTIFICATION_LEVELS: readonly NotificationLevel[] = ['all', 'significant', 'major', 'comments', 'none'];

export type DocumentEventKind = 'comment' | 'significant' | 'major';

export interface Follow {
  userId: string;
  documentIdentifier: string;
  level: NotificationLevel;
  createdAt: string;
  updatedAt: string;
}

export interface DocumentEvent {
  kind: DocumentEventKind;
  actorId: string;
  summary: string;
}

export type AuditEntityType = 'submission' | 'document' | 'comment' | 'user' | 'working_group';

export interface AuditRecord {
  id: number;
  entityType: AuditEntityType;
  entityId: string;
  action: string;
  fromStatus?: string;
  toStatus?: string;
  actorId: string;
  details?: string;
  createdAt: string;
}

export type GovernanceRequest = IRequest & { user?: User };
