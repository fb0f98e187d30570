'use strict';

import _ from 'lodash';
import {
  forceCenter,
  forceLink,
  forceManyBody,
  forceSimulation,
  type SimulationLinkDatum,
  type SimulationNodeDatum,
} from 'd3-force';

import type DFA from '../DFA';
import type { Transition } from '../TransitionSpec';

export interface Vertex extends SimulationNodeDatum {
  label: string,
  initial: boolean,
  accepting: boolean,
  outTrans: {
    [symbol: string]: {
      transition: Transition,
      edge: LayoutEdge
    }
  }
}

export interface VertexLUT {
  [state: string]: Vertex
}

export interface LayoutEdge extends SimulationLinkDatum<Vertex> {
  source: Vertex,
  target: Vertex,
  labels: string[]
}

type Graph = {vertices: VertexLUT, edges: LayoutEdge[]};

/**
 * Derive the graph (vertices & edges) for a diagram of the automaton.
 * Edges with the same source and target are combined.
 */
function deriveGraph (automaton: DFA): Graph {
  // We need two passes, since edges may point at vertices yet to be created.
  // 1. Create all the vertices.
  let vertices: VertexLUT = {};
  for (const state of automaton.states) {
    vertices[state] = {
      label: state,
      initial: state === automaton.initialState,
      accepting: automaton.terminalStates.has(state),
      outTrans: {}
    };
  }

  // 2. Create the edges, which can now point at any vertex object.
  let edges: LayoutEdge[] = [];
  _.forEach(_.groupBy(automaton.transitions(), 'from'), (transitions, state) => {
    let vertex = vertices[state];

    // Combine edges with the same source and target
    let cache: {[to: string]: LayoutEdge} = {};
    function edgeTo (target: string, label: string): LayoutEdge {
      let edge = cache[target] ||
        _.tap(cache[target] = {
          source: vertex,
          target: vertices[target],
          labels: []
        }, (created) => edges.push(created));
      edge.labels.push(label);
      return edge;
    }

    for (const transition of transitions) {
      vertex.outTrans[transition.read] = {
        transition: transition,
        edge: edgeTo(transition.to, labelFor(transition))
      };
    }
  });

  return {vertices: vertices, edges: edges};
}

function labelFor (trans: Transition): string {
  return visibleSpace(trans.read);
}

// replace ' ' with '␣'.
function visibleSpace (c: string): string {
  return (c === ' ') ? '␣' : c;
}


/**
 * Aids rendering an automaton as a node-link diagram.
 *
 * • Generates the vertices and edges ("nodes" and "links") for a diagram.
 * • Provides mapping of each state to its vertex and each transition to its edge.
 */
export default class StateGraph {
  private readonly derived: Graph;

  constructor (automaton: DFA) {
    this.derived = deriveGraph(automaton);
  }

  /**
   * Returns the mapping from states to vertices.
   */
  public getVertexMap (): VertexLUT {
    return this.derived.vertices;
  }

  public getEdges (): LayoutEdge[] {
    return this.derived.edges;
  }

  /**
   * Look up a state's corresponding vertex.
   */
  public getVertex (state: string): Vertex | undefined {
    return this.derived.vertices[state];
  }

  public getInstructionAndEdge (state: string, symbol: string): Vertex['outTrans'][string] | undefined {
    let vertex = this.derived.vertices[state];
    if (vertex === undefined) {
      throw new Error('not a valid state: ' + String(state));
    }

    return vertex.outTrans[symbol];
  }

  /**
   * Position the vertices (sets `x`/`y`) by running a force simulation for a
   * fixed number of ticks. The simulation is stopped before it returns.
   */
  public layout (ticks = 300, width = 400, height = 300): VertexLUT {
    let nodes = _.values(this.derived.vertices);
    let simulation = forceSimulation<Vertex, LayoutEdge>(nodes)
      .force('link', forceLink<Vertex, LayoutEdge>(this.derived.edges).distance(80))
      .force('charge', forceManyBody<Vertex>().strength(-200))
      .force('center', forceCenter(width / 2, height / 2))
      .stop();

    simulation.tick(ticks);
    return this.derived.vertices;
  }
}
