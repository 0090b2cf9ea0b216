/**
 * fabric-promote
 *
 * Promotes Fabric items from a source-controlled folder tree into a target
 * workspace. Portable, testable, dependency-injected.
 */

// Core interfaces and Node implementations
export * from '#/core';

// Item types (markers, definition files)
export * from '#/item-types';

// Errors
export * from '#/errors';

// Schemas (Zod validation)
export * from '#/schemas';

// Configuration loading
export * from '#/config';

// Logging
export * from '#/logging';

// Authentication
export * from '#/auth';

// Fabric REST API client
export * from '#/fabric';

// Reconcilers
export * from '#/workspace';
export * from '#/access';

// Artifact discovery and materialization
export * from '#/artifact';

// Source retrieval
export * from '#/source';

// Orchestration and reporting
export * from '#/deploy';
