/**
 * @fileoverview Container manager exports
 * @module containers
 */

export {
  ContainerManager,
  ContainerRegistry,
  createContainerRegistry,
  buildReadinessMatcher,
  type ContainerConfig,
  type ContainerManagerDependencies,
  type IContainerInstance,
  type ManagedContainer,
} from './base';

export { GenericContainerManager, createGenericContainer, type GenericConfig } from './generic';
