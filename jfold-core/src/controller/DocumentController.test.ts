import { describe, it, expect } from 'vitest';
import { DocumentController } from './DocumentController';
import type { ControllerOptions } from './DocumentController';
import { formatLinePlain } from '../flatten';
import { IncrementalParser, parseDocument } from '../parser';
import { SearchEngine } from '../search';
import { ValueTree } from '../tree';

// lines: { / "a": 1, / "b": [ / 1, / 2, / 3 / ] / }
// ids:   1 / 2       / 3      / 4  / 5  / 6 / 3 / 1
const SMALL = '{"a":1,"b":[1,2,3]}';
const NUMBERS = JSON.stringify(Array.from({ length: 20 }, (_, i) => i));

function open(text: string, options: Partial<ControllerOptions> = {}): DocumentController {
  return new DocumentController(parseDocument(text), { height: 10, width: 40, scrolloff: 0, ...options });
}

function focusedText(controller: DocumentController): string | null {
  const line = controller.focusedLine;
  return line ? formatLinePlain(controller.tree, line, controller.mode) : null;
}

describe('DocumentController', () => {
  describe('vertical movement', () => {
    it('starts on the first row', () => {
      expect(open(SMALL).cursor).toEqual({ line: 0, node: 1, onClose: false });
    });

    it('clamps moves to the document', () => {
      const c = open(SMALL);
      expect(c.move(2)).toBe(true);
      expect(c.cursor).toEqual({ line: 2, node: 3, onClose: false });
      c.move(100);
      expect(c.cursor).toEqual({ line: 7, node: 1, onClose: true });
      c.move(-100);
      expect(c.cursor?.line).toBe(0);
      expect(c.move(-1)).toBe(false);
    });

    it('jumps to top, bottom and a given line', () => {
      const c = open(NUMBERS, { height: 5 });
      c.moveToBottom();
      expect(c.cursor?.line).toBe(21);
      expect(c.viewport.top).toBe(17);
      c.moveToLine(4);
      expect(c.cursor?.node).toBe(5);
      c.moveToTop();
      expect(c.viewport.top).toBe(0);
    });
  });

  describe('structural movement', () => {
    it('moves between siblings, including from a closing row', () => {
      const c = open(SMALL);
      c.moveToLine(1);
      expect(c.moveToSibling('next')).toBe(true);
      expect(c.cursor).toEqual({ line: 2, node: 3, onClose: false });
      expect(c.moveToSibling('next')).toBe(false);
      c.moveToLine(6);
      c.moveToSibling('prev');
      expect(c.cursor).toEqual({ line: 1, node: 2, onClose: false });
    });

    it('moves to the first and last sibling', () => {
      const c = open(SMALL);
      c.moveToLine(3);
      c.moveToLastSibling();
      expect(c.cursor?.node).toBe(6);
      c.moveToFirstSibling();
      expect(c.cursor?.node).toBe(4);
    });

    it('moves to the parent but not past a top-level value', () => {
      const c = open(SMALL);
      c.moveToLine(4);
      expect(c.moveToParent()).toBe(true);
      expect(c.cursor).toEqual({ line: 2, node: 3, onClose: false });
      c.moveToParent();
      expect(c.moveToParent()).toBe(false);
    });

    it('jumps between matching delimiters in line mode', () => {
      const c = open(SMALL);
      c.moveToLine(2);
      expect(c.moveToMatchingDelimiter()).toBe(true);
      expect(c.cursor).toEqual({ line: 6, node: 3, onClose: true });
      c.moveToMatchingDelimiter();
      expect(c.cursor?.line).toBe(2);
      c.moveToLine(1);
      expect(c.moveToMatchingDelimiter()).toBe(false);
    });

    it('collapses before moving to the parent (h)', () => {
      const c = open(SMALL);
      c.moveToLine(2);
      c.collapseOrParent();
      expect(c.totalLines).toBe(4);
      expect(c.cursor?.line).toBe(2);
      c.collapseOrParent();
      expect(c.cursor?.node).toBe(1);
    });

    it('expands before stepping into a container (l)', () => {
      const c = open(SMALL);
      c.moveToLine(2);
      c.collapseFocused();
      c.expandOrFirstChild();
      expect(c.totalLines).toBe(8);
      c.expandOrFirstChild();
      expect(c.cursor).toEqual({ line: 3, node: 4, onClose: false });
      expect(c.expandOrFirstChild()).toBe(false);
    });
  });

  describe('collapse', () => {
    it('moves a hidden cursor to its collapsed ancestor', () => {
      const c = open(SMALL);
      c.moveToLine(4);
      c.collapseAll(1);
      expect(c.cursor).toEqual({ line: 2, node: 3, onClose: false });
    });

    it('keeps the cursor on a closing row when rows above it change', () => {
      // lines: { / "x": [ / [ / 1 / ] / ], / "b": [ / 3 / ] / }
      const c = open('{"x":[[1]],"b":[3]}');
      c.moveToLine(8);
      expect(c.cursor).toEqual({ line: 8, node: 5, onClose: true });
      c.collapseAll(2);
      expect(c.cursor).toEqual({ line: 6, node: 5, onClose: true });
    });

    it('falls back to the first row when the focused container collapses', () => {
      const c = open(SMALL);
      c.moveToLine(6);
      expect(c.toggleFocusedCollapse()).toBe(true);
      expect(c.cursor).toEqual({ line: 2, node: 3, onClose: false });
      expect(focusedText(c)).toBe('  "b": [...]');
    });

    it('toggles recursively', () => {
      const c = open('{"a":{"b":[1]}}');
      c.collapseFocusedRecursive();
      expect(c.totalLines).toBe(1);
      c.expandFocused();
      expect(c.totalLines).toBe(3);
      c.expandFocusedRecursive();
      expect(c.totalLines).toBe(7);
    });

    it('ignores toggles on scalars', () => {
      const c = open(SMALL);
      c.moveToLine(1);
      expect(c.toggleFocusedCollapse()).toBe(false);
    });

    it('resolves the cursor to a visible ancestor from every row', () => {
      const c = open('{"a":{"b":[1,{"c":null},[]],"d":"x"},"e":[true,{"f":{"g":[0]}}]}');
      const total = c.totalLines;
      for (let i = 0; i < total; i++) {
        c.expandAll();
        c.moveToLine(i);
        const before = c.cursor?.node ?? -1;
        c.collapseAll(1);
        const after = c.cursor;
        expect(after).not.toBeNull();
        if (!after) continue;
        expect(c.flattener.lineAt(after.line)?.node).toBe(after.node);
        expect(after.node === before || c.tree.ancestors(before).includes(after.node)).toBe(true);
      }
    });
  });

  describe('scrolling', () => {
    it('drags the cursor to stay inside the scrolloff window', () => {
      const c = open(NUMBERS, { height: 5, scrolloff: 1 });
      expect(c.scrollViewport(3)).toBe(true);
      expect(c.viewport.top).toBe(3);
      expect(c.cursor?.line).toBe(4);
      c.scrollViewport(-10);
      expect(c.viewport.top).toBe(0);
      expect(c.cursor?.line).toBe(3);
    });

    it('moves cursor and window together by pages', () => {
      const c = open(NUMBERS, { height: 5 });
      c.halfPageDown();
      expect([c.viewport.top, c.cursor?.line]).toEqual([2, 2]);
      c.pageDown();
      expect([c.viewport.top, c.cursor?.line]).toEqual([5, 5]);
      c.pageUp(2);
      expect([c.viewport.top, c.cursor?.line]).toEqual([0, 0]);
    });

    it('aligns the cursor row', () => {
      const c = open(NUMBERS, { height: 5 });
      c.moveToLine(10);
      expect(c.viewport.top).toBe(6);
      c.alignFocused('top');
      expect(c.viewport.top).toBe(10);
      c.alignFocused('center');
      expect(c.viewport.top).toBe(8);
    });

    it('scrolls horizontally up to the widest row on screen', () => {
      const c = open(JSON.stringify(['x'.repeat(50)]), { width: 20 });
      c.scrollHorizontal(100);
      expect(c.viewport.left).toBe(34);
    });

    it('keeps the cursor on screen after a resize', () => {
      const c = open(NUMBERS, { height: 5 });
      c.moveToLine(15);
      expect(c.viewport.top).toBe(11);
      c.resize(3, 40);
      expect(c.viewport.top).toBe(13);
    });
  });

  describe('view mode', () => {
    it('re-resolves the cursor when closing rows disappear', () => {
      const c = open(SMALL);
      c.moveToLine(6);
      expect(c.setViewMode('data')).toBe(true);
      expect(c.cursor).toEqual({ line: 2, node: 3, onClose: false });
      expect(c.totalLines).toBe(6);
      expect(c.setViewMode('data')).toBe(false);
    });
  });

  describe('search integration', () => {
    it('reveals a match inside a collapsed ancestor', () => {
      const tree = parseDocument('{"outer":{"k":"needle value"}}', { collapseDepth: 1 });
      const c = new DocumentController(tree, { height: 10, width: 40 });
      expect(c.totalLines).toBe(3);

      const search = new SearchEngine();
      search.setPattern('needle');
      search.findAll(tree);
      const match = search.seek(c.searchAnchor('forward'));
      expect(match?.node).toBe(3);
      if (!match) return;

      expect(c.revealNode(match.node)).toBe(true);
      expect(c.cursor).toEqual({ line: 2, node: 3, onClose: false });
      expect(focusedText(c)).toBe('    "k": "needle value"');
    });

    it('anchors searches after a subtree when on its closing row', () => {
      const c = open(SMALL);
      c.moveToLine(6);
      expect(c.searchAnchor('forward')).toBe(6);
      expect(c.searchAnchor('backward')).toBe(7);
    });
  });

  describe('clipboard text', () => {
    it('serializes the focused value, path and key', () => {
      const c = open(SMALL);
      c.moveToLine(2);
      expect(c.focusedValueText()).toBe('[\n  1,\n  2,\n  3\n]');
      expect(c.focusedPathText()).toBe('.b');
      expect(c.focusedKeyText()).toBe('b');
      c.moveToLine(4);
      expect(c.focusedKeyText()).toBe('1');
      expect(c.focusedPathText()).toBe('.b[1]');
    });
  });

  describe('empty and growing documents', () => {
    it('has no cursor on an empty document', () => {
      const c = new DocumentController(parseDocument('', { mode: 'jsonl' }), { height: 5, width: 40 });
      expect(c.cursor).toBeNull();
      expect(c.move(1)).toBe(false);
      expect(c.focusedValueText()).toBeNull();
    });

    it('places the cursor once rows arrive and refuses bulk collapse while loading', () => {
      const tree = new ValueTree();
      const c = new DocumentController(tree, { height: 5, width: 40 });
      new IncrementalParser(tree).push('[1,');
      expect(c.documentGrew()).toBe(true);
      expect(c.cursor).toEqual({ line: 0, node: 1, onClose: false });
      expect(c.collapseAll()).toBe(false);
      expect(c.expandAll()).toBe(false);
    });
  });
});
