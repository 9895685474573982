/**
 * Tests for PanelState
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { PanelState } from './panel-state.js';

describe('PanelState', () => {
  let transitions: boolean[];
  let requests: string[];
  let panel: PanelState;

  beforeEach(() => {
    transitions = [];
    requests = [];
    panel = new PanelState({
      onVisibilityChange: (visible) => transitions.push(visible),
      onRequest: (request) => requests.push(request),
    });
  });

  it('starts hidden', () => {
    expect(panel.isVisible()).toBe(false);
  });

  it('resolves toggle against the current visibility', () => {
    expect(panel.request('toggle')).toBe(true);
    expect(panel.request('toggle')).toBe(false);
    expect(requests).toEqual(['open', 'close']);
    expect(transitions).toEqual([true, false]);
  });

  it('only reports real transitions', () => {
    panel.setVisible(true);
    panel.setVisible(true);
    panel.request('open');
    expect(transitions).toEqual([true]);
    expect(requests).toEqual(['open']);
  });
});
