/**
 * Pattern Registry
 *
 * The complete, build-time list of demos the catalog can construct.
 * Adding a demo means adding one entry here.
 *
 * @module
 */

import type { PatternRegistration } from "../interfaces/IPatternDemo.js";
import {
  AbstractFactoryPatternDemo,
  BuilderPatternDemo,
  FactoryMethodPatternDemo,
  PrototypePatternDemo,
  SingletonPatternDemo,
  AdapterPatternDemo,
  BridgePatternDemo,
  CompositePatternDemo,
  DecoratorPatternDemo,
  FacadePatternDemo,
  FlyweightPatternDemo,
  ProxyPatternDemo,
  ChainOfResponsibilityPatternDemo,
  CommandPatternDemo,
  InterpreterPatternDemo,
  IteratorPatternDemo,
  MediatorPatternDemo,
  MementoPatternDemo,
  ObserverPatternDemo,
  StatePatternDemo,
  StrategyPatternDemo,
  TemplateMethodPatternDemo,
  VisitorPatternDemo,
} from "../patterns/index.js";

export const PATTERN_REGISTRY: readonly PatternRegistration[] = [
  // Creational
  { id: "abstract-factory", category: "Creational", create: (out) => new AbstractFactoryPatternDemo(out) },
  { id: "builder", category: "Creational", create: (out) => new BuilderPatternDemo(out) },
  { id: "factory-method", category: "Creational", create: (out) => new FactoryMethodPatternDemo(out) },
  { id: "prototype", category: "Creational", create: (out) => new PrototypePatternDemo(out) },
  { id: "singleton", category: "Creational", create: (out) => new SingletonPatternDemo(out) },

  // Structural
  { id: "adapter", category: "Structural", create: (out) => new AdapterPatternDemo(out) },
  { id: "bridge", category: "Structural", create: (out) => new BridgePatternDemo(out) },
  { id: "composite", category: "Structural", create: (out) => new CompositePatternDemo(out) },
  { id: "decorator", category: "Structural", create: (out) => new DecoratorPatternDemo(out) },
  { id: "facade", category: "Structural", create: (out) => new FacadePatternDemo(out) },
  { id: "flyweight", category: "Structural", create: (out) => new FlyweightPatternDemo(out) },
  { id: "proxy", category: "Structural", create: (out) => new ProxyPatternDemo(out) },

  // Behavioral
  { id: "chain-of-responsibility", category: "Behavioral", create: (out) => new ChainOfResponsibilityPatternDemo(out) },
  { id: "command", category: "Behavioral", create: (out) => new CommandPatternDemo(out) },
  { id: "interpreter", category: "Behavioral", create: (out) => new InterpreterPatternDemo(out) },
  { id: "iterator", category: "Behavioral", create: (out) => new IteratorPatternDemo(out) },
  { id: "mediator", category: "Behavioral", create: (out) => new MediatorPatternDemo(out) },
  { id: "memento", category: "Behavioral", create: (out) => new MementoPatternDemo(out) },
  { id: "observer", category: "Behavioral", create: (out) => new ObserverPatternDemo(out) },
  { id: "state", category: "Behavioral", create: (out) => new StatePatternDemo(out) },
  { id: "strategy", category: "Behavioral", create: (out) => new StrategyPatternDemo(out) },
  { id: "template-method", category: "Behavioral", create: (out) => new TemplateMethodPatternDemo(out) },
  { id: "visitor", category: "Behavioral", create: (out) => new VisitorPatternDemo(out) },
];
