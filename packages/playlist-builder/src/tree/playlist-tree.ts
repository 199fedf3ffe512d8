/**
 * Output playlist tree.
 *
 * Nodes are kept in an arena and refer to each other by index. Folders own an
 * ordered list of children; playlists own an ordered list of track ids.
 *
 * Within each top-level subtree, track ids are deduplicated per
 * "<parent name> -> <playlist name>": two same-named playlists in same-named
 * folders share one set, and the first to receive a track keeps it.
 */

import type { PlaylistDocumentNode, PlaylistFolderDocument } from '../types';

export type PlaylistNodeType = 'folder' | 'playlist';

export interface PlaylistTreeNode {
  index: number;
  name: string;
  type: PlaylistNodeType;
  parent: number | null;
  children: number[];
  trackIds: string[];
}

export class PlaylistTree {
  private nodes: PlaylistTreeNode[] = [];
  private trackSets = new Map<string, Set<string>>();
  readonly root: number;

  constructor(rootName: string) {
    this.root = this.createNode(rootName, 'folder', null);
  }

  get(index: number): PlaylistTreeNode {
    const node = this.nodes[index];
    if (!node) {
      throw new RangeError(`No playlist node at index ${index}`);
    }
    return node;
  }

  get size(): number {
    return this.nodes.length;
  }

  /**
   * Create a folder under `parent`; `position` defaults to the end
   */
  addFolder(parent: number, name: string, position?: number): number {
    return this.attach(parent, name, 'folder', position);
  }

  addPlaylist(parent: number, name: string, position?: number): number {
    return this.attach(parent, name, 'playlist', position);
  }

  /**
   * Append a track to a playlist unless it is already there, or in a playlist
   * with the same name and parent name
   */
  addTrack(playlist: number, trackId: string): boolean {
    const node = this.get(playlist);
    if (node.type !== 'playlist') {
      throw new TypeError(`"${node.name}" is a folder and cannot hold tracks`);
    }

    const key = this.trackSetKey(node);
    let seen = this.trackSets.get(key);
    if (!seen) {
      seen = new Set();
      this.trackSets.set(key, seen);
    }
    if (seen.has(trackId)) return false;

    seen.add(trackId);
    node.trackIds.push(trackId);
    return true;
  }

  children(index: number): PlaylistTreeNode[] {
    return this.get(index).children.map(child => this.get(child));
  }

  parentOf(index: number): number | null {
    return this.get(index).parent;
  }

  /**
   * Enclosing folders, nearest first
   */
  ancestors(index: number): PlaylistTreeNode[] {
    const ancestors: PlaylistTreeNode[] = [];
    let parent = this.get(index).parent;
    while (parent !== null) {
      const node = this.get(parent);
      ancestors.push(node);
      parent = node.parent;
    }
    return ancestors;
  }

  /**
   * Direct child with the given name and type
   */
  findChild(parent: number, name: string, type?: PlaylistNodeType): PlaylistTreeNode | undefined {
    return this.children(parent).find(
      child => child.name === name && (type === undefined || child.type === type)
    );
  }

  /**
   * Pre-order walk of the subtree rooted at `index`
   */
  *walk(index: number = this.root): Generator<PlaylistTreeNode> {
    const node = this.get(index);
    yield node;
    for (const child of node.children) {
      yield* this.walk(child);
    }
  }

  playlists(index: number = this.root): PlaylistTreeNode[] {
    return Array.from(this.walk(index)).filter(node => node.type === 'playlist');
  }

  /**
   * First node in pre-order with exactly this name
   */
  findByName(name: string, index: number = this.root): PlaylistTreeNode | undefined {
    for (const node of this.walk(index)) {
      if (node.name === name) return node;
    }
    return undefined;
  }

  toDocument(index: number = this.root): PlaylistDocumentNode {
    const node = this.get(index);
    if (node.type === 'playlist') {
      return { type: 'playlist', name: node.name, trackIds: [...node.trackIds] };
    }
    return {
      type: 'folder',
      name: node.name,
      children: node.children.map(child => this.toDocument(child))
    };
  }

  /**
   * Document form of the root folder
   */
  toFolderDocument(): PlaylistFolderDocument {
    const root = this.get(this.root);
    return {
      type: 'folder',
      name: root.name,
      children: root.children.map(child => this.toDocument(child))
    };
  }

  private trackSetKey(node: PlaylistTreeNode): string {
    let top = node;
    while (top.parent !== null && top.parent !== this.root) {
      top = this.get(top.parent);
    }
    const parent = node.parent === null ? '' : this.get(node.parent).name;
    return `${top.index}:${parent} -> ${node.name}`;
  }

  private createNode(name: string, type: PlaylistNodeType, parent: number | null): number {
    const index = this.nodes.length;
    this.nodes.push({ index, name, type, parent, children: [], trackIds: [] });
    return index;
  }

  private attach(parent: number, name: string, type: PlaylistNodeType, position?: number): number {
    const parentNode = this.get(parent);
    if (parentNode.type !== 'folder') {
      throw new TypeError(`"${parentNode.name}" is a playlist and cannot hold children`);
    }

    const child = this.createNode(name, type, parent);
    if (position === undefined) {
      parentNode.children.push(child);
    } else {
      parentNode.children.splice(position, 0, child);
    }
    return child;
  }
}
