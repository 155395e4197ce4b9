/**
 * 順位（rank）で並ぶスプレー木
 *
 * キーを持たず、in-order 走査の順がそのまま文書の文字順になる。
 * 各ノードはサブツリーのノード数 size を持ち、size を辿って k 番目のノードを探す。
 * rank はノードに保存しない（構造が変わるたびに変化するため、必要な時に size から求める）。
 * バランス情報も持たず、アクセスしたノードを根へスプレーすることで償却 O(log n) を得る。
 */

import { RopeError, checkIndex } from './errors.js'

/** スプレー木のノード（1文字） */
export interface SplayNode {
  /** 保持する文字 */
  value: string
  /** 左の子 */
  left: SplayNode | null
  /** 右の子 */
  right: SplayNode | null
  /** 親ノード（スプレー時の移動用。所有はしない） */
  parent: SplayNode | null
  /** サブツリーのノード数（自身を含む） */
  size: number
}

/** 木のハンドル。split / merge で消費されたハンドルは空になる */
export interface SplayTree {
  root: SplayNode | null
  /** root.size のキャッシュ（空なら 0） */
  size: number
}

/** ノードを作成 */
export function createNode(value: string): SplayNode {
  return { value, left: null, right: null, parent: null, size: 1 }
}

/** 空の木を作成 */
export function createTree(): SplayTree {
  return { root: null, size: 0 }
}

/** ノードのサイズ（nullは0） */
export function nodeSize(node: SplayNode | null): number {
  return node ? node.size : 0
}

function update(node: SplayNode): void {
  node.size = 1 + nodeSize(node.left) + nodeSize(node.right)
}

/**
 * node を親の子リンク（親がなければ tree.root）から replacement に付け替える。
 * replacement.parent も合わせて更新する。
 */
function replaceChild(tree: SplayTree, node: SplayNode, replacement: SplayNode): void {
  const parent = node.parent
  replacement.parent = parent
  if (parent === null) {
    tree.root = replacement
  } else if (parent.left === node) {
    parent.left = replacement
  } else {
    parent.right = replacement
  }
}

/** 右回転。左の子を node の位置へ持ち上げる。左の子がなければ何もしない */
export function rotateRight(tree: SplayTree, node: SplayNode): void {
  const left = node.left
  if (left === null) return
  const inner = left.right

  replaceChild(tree, node, left)
  left.right = node
  node.parent = left
  node.left = inner
  if (inner) inner.parent = node

  // 子になった node を先に
  update(node)
  update(left)
}

/** 左回転。右の子を node の位置へ持ち上げる。右の子がなければ何もしない */
export function rotateLeft(tree: SplayTree, node: SplayNode): void {
  const right = node.right
  if (right === null) return
  const inner = right.left

  replaceChild(tree, node, right)
  right.left = node
  node.parent = right
  node.right = inner
  if (inner) inner.parent = node

  update(node)
  update(right)
}

/** node を木の根までスプレーする */
export function splay(tree: SplayTree, node: SplayNode): void {
  let parent = node.parent
  while (parent !== null) {
    const grandParent = parent.parent
    const isLeft = node === parent.left

    if (grandParent === null) {
      // Zig
      if (isLeft) rotateRight(tree, parent)
      else rotateLeft(tree, parent)
    } else if (isLeft === (parent === grandParent.left)) {
      // Zig-zig: 祖父から先に回す
      if (isLeft) {
        rotateRight(tree, grandParent)
        rotateRight(tree, parent)
      } else {
        rotateLeft(tree, grandParent)
        rotateLeft(tree, parent)
      }
    } else {
      // Zig-zag
      if (isLeft) {
        rotateRight(tree, parent)
        rotateLeft(tree, grandParent)
      } else {
        rotateLeft(tree, parent)
        rotateRight(tree, grandParent)
      }
    }

    parent = node.parent
  }
}

/**
 * 0始まりで k 番目のノードを探し、根へスプレーして返す。
 * k は [0, tree.size) でなければ RopeRangeError。
 */
export function locate(tree: SplayTree, k: number): SplayNode {
  checkIndex('k', k, 0, tree.size - 1)

  let node = tree.root
  let remaining = k
  while (node !== null) {
    const s = nodeSize(node.left)
    if (remaining === s) break
    if (remaining < s) {
      node = node.left
    } else {
      remaining -= s + 1
      node = node.right
    }
  }
  if (node === null) {
    throw new RopeError(`size が不整合です: ${k} 番目のノードが見つかりません`)
  }

  splay(tree, node)
  return node
}

/**
 * node をサブツリーの最大（最も右）まで辿り、根へスプレーする。
 * node が null なら null。
 */
export function subtreeMaximum(tree: SplayTree, node: SplayNode | null): SplayNode | null {
  if (node === null) return null
  let current = node
  while (current.right !== null) current = current.right
  splay(tree, current)
  return current
}

/**
 * 一括構築用の挿入。
 * 新しいノードを根にし、それまでの木をその左の子にする（つまり末尾に追加される）。
 * 構築直後の木は一直線になるが、以後のスプレーで平らになっていく。
 */
export function appendAsNewRoot(tree: SplayTree, value: string): SplayNode {
  const node = createNode(value)
  const oldRoot = tree.root
  if (oldRoot) oldRoot.parent = node
  node.left = oldRoot
  update(node)
  tree.root = node
  tree.size = node.size
  return node
}

/**
 * 位置 rank に1文字挿入し、新しいノードを根にする。
 * rank は [0, tree.size] でなければ RopeRangeError。
 */
export function insert(tree: SplayTree, rank: number, value: string): SplayNode {
  checkIndex('rank', rank, 0, tree.size)

  const node = createNode(value)

  if (tree.size === 0) {
    tree.root = node
    tree.size = 1
    return node
  }

  if (rank === tree.size) {
    // 末尾: 最後のノードを左の子にする
    const last = locate(tree, rank - 1)
    node.left = last
    last.parent = node
  } else {
    // 現在 rank にあるノードが右の子になり、その左サブツリーを引き継ぐ
    const right = locate(tree, rank)
    node.left = right.left
    if (node.left) node.left.parent = node
    right.left = null
    right.parent = node
    update(right)
    node.right = right
  }

  update(node)
  tree.root = node
  tree.size = node.size
  return node
}

/**
 * rank で木を2つに分ける。
 * 0..rank は左の木、rank+1.. は右の木に入る（右は空のこともある）。
 * 元の tree は消費され空になる。
 */
export function split(tree: SplayTree, rank: number): [SplayTree, SplayTree] {
  const root1 = locate(tree, rank)
  const root2 = root1.right
  root1.right = null
  update(root1)

  const left: SplayTree = { root: root1, size: root1.size }
  const right = createTree()
  if (root2) {
    root2.parent = null
    right.root = root2
    right.size = root2.size
  }

  tree.root = null
  tree.size = 0
  return [left, right]
}

/**
 * tree1 の後ろに tree2 を連結する。
 * どちらかが空ならもう一方をそのまま返す。
 * それ以外は tree1 のハンドルを返し、tree2 は空になる。
 */
export function merge(tree1: SplayTree, tree2: SplayTree): SplayTree {
  if (tree1.root === null) return tree2
  const root2 = tree2.root
  if (root2 === null) return tree1

  const root1 = subtreeMaximum(tree1, tree1.root)
  if (root1 === null) return tree2
  root1.right = root2
  root2.parent = root1
  update(root1)
  tree1.size = root1.size

  tree2.root = null
  tree2.size = 0
  return tree1
}

/**
 * 切り取り＆貼り付け。
 * 位置 [i, j] の部分列を取り除き、残りの文書の k 文字目の直後へ移す（k = 0 なら先頭）。
 * i, j は0始まり、k は1始まりで数える。
 * 範囲外の引数は何も変更せずに RopeRangeError を投げる。
 */
export function moveRange(tree: SplayTree, i: number, j: number, k: number): void {
  const n = tree.size
  checkIndex('i', i, 0, n - 1)
  checkIndex('j', j, i, n - 1)
  checkIndex('k', k, 0, n - (j - i + 1))

  let [middle, right] = split(tree, j)
  let left = createTree()
  if (i > 0) {
    ;[left, middle] = split(middle, i - 1)
  }
  left = merge(left, right)
  if (k > 0) {
    ;[left, right] = split(left, k - 1)
  } else {
    right = left
    left = createTree()
  }
  const result = merge(merge(left, middle), right)

  tree.root = result.root
  tree.size = result.size
}

/**
 * in-order 走査で全文字を順に取得する。
 * 再帰ではなく明示的なスタックを使う（木が一直線でも呼び出しスタックを消費しない）。
 */
export function materialize(tree: SplayTree): string[] {
  const result: string[] = []
  const stack: SplayNode[] = []
  let current = tree.root

  while (true) {
    while (current !== null) {
      stack.push(current)
      current = current.left
    }
    const node = stack.pop()
    if (node === undefined) break
    result.push(node.value)
    current = node.right
  }

  return result
}

/**
 * 全ノードを post-order で1回ずつ解放（リンクを切る）し、木を空にする。
 * ノードのスタックと「右の子を処理済みか」のフラグのスタックを並行して持つ。
 * 解放したノード数を返す。
 */
export function destroy(tree: SplayTree | null): number {
  if (tree === null || tree.root === null) return 0

  const stack: SplayNode[] = []
  const visited: boolean[] = []
  let freed = 0

  const pushLeftPath = (start: SplayNode | null): void => {
    let node = start
    while (node !== null) {
      stack.push(node)
      visited.push(false)
      node = node.left
    }
  }

  pushLeftPath(tree.root)
  while (stack.length > 0) {
    const top = stack.length - 1
    const node = stack[top]!
    if (visited[top]) {
      stack.pop()
      visited.pop()
      node.left = null
      node.right = null
      node.parent = null
      node.size = 0
      freed++
    } else {
      visited[top] = true
      pushLeftPath(node.right)
    }
  }

  tree.root = null
  tree.size = 0
  return freed
}

/**
 * 木の不変条件を検査する（テスト・デバッグ用）。
 * - 根の parent は null
 * - 全ノードで size == 1 + size(left) + size(right)
 * - 子の parent は親を指す
 * - tree.size == size(root) == 到達できるノード数
 * 最初に見つかった違反を RopeError として投げる。
 */
export function checkInvariants(tree: SplayTree): void {
  const root = tree.root
  if (root === null) {
    if (tree.size !== 0) throw new RopeError(`空の木の size が ${tree.size} です`)
    return
  }
  if (root.parent !== null) throw new RopeError('根の parent が null ではありません')
  if (tree.size !== root.size) {
    throw new RopeError(`tree.size (${tree.size}) と root.size (${root.size}) が一致しません`)
  }

  let count = 0
  const stack: SplayNode[] = [root]
  let node: SplayNode | undefined
  while ((node = stack.pop()) !== undefined) {
    if (++count > tree.size) throw new RopeError('到達できるノードが size より多くあります')

    const expected = 1 + nodeSize(node.left) + nodeSize(node.right)
    if (node.size !== expected) {
      throw new RopeError(`ノード '${node.value}' の size が ${node.size} です（期待値 ${expected}）`)
    }
    for (const child of [node.left, node.right]) {
      if (child === null) continue
      if (child.parent !== node) {
        throw new RopeError(`ノード '${child.value}' の parent が親を指していません`)
      }
      stack.push(child)
    }
  }

  if (count !== tree.size) {
    throw new RopeError(`到達できるノード数 ${count} が size ${tree.size} と一致しません`)
  }
}
