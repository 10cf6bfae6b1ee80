export {
  apiGroupOf,
  deepCopy,
  describeIdentity,
  identityKey,
  identityOf,
  isSameObject,
  isSameValue,
  kindKey,
  namespacedNameOf,
  toComparable,
} from './identity.js';
