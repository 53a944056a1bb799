/**
 * blueprint-host
 *
 * Renders a UI tree described by a sandboxed QuickJS script onto a host-side
 * render tree with computed layout.
 */

export * from './host';
export * from './sandbox';
export * from './shared';
export { VERSION } from './version';
