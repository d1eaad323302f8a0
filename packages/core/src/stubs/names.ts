/**
 * Qualified names for scopes and members
 *
 *   qualify('Process', 'Status')  → 'Process::Status'
 *   qualify('Foo', '::Bar')       → 'Bar'
 *   memberRef('ENV', 'fetch', false) → 'ENV#fetch'
 *   memberRef('ENV', 'fetch', true)  → 'ENV.fetch'
 */

export function qualify(parent: string | null, name: string): string {
  if (name.startsWith('::')) {
    return name.slice(2);
  }
  return parent ? `${parent}::${name}` : name;
}

export function memberRef(scope: string | null, method: string, singleton: boolean): string {
  if (!scope) return method;
  return `${scope}${singleton ? '.' : '#'}${method}`;
}

export function constantRef(scope: string | null, name: string): string {
  if (!scope || name.startsWith('$')) return name;
  return `${scope}::${name}`;
}

/** Last segment of a qualified name: 'Errno::ENOENT' → 'ENOENT' */
export function baseName(qualified: string): string {
  const idx = qualified.lastIndexOf('::');
  return idx === -1 ? qualified : qualified.slice(idx + 2);
}

/** Parent of a qualified name: 'Errno::ENOENT' → 'Errno', 'String' → null */
export function parentName(qualified: string): string | null {
  const idx = qualified.lastIndexOf('::');
  return idx === -1 ? null : qualified.slice(0, idx);
}
