/**
 * Pattern Demonstrations
 *
 * One module per GoF pattern. Each exports its demo class plus the pattern's
 * participants.
 *
 * @module
 */

// Creational
export { AbstractFactoryPatternDemo } from "./creational/abstract-factory.js";
export { BuilderPatternDemo } from "./creational/builder.js";
export { FactoryMethodPatternDemo } from "./creational/factory-method.js";
export { PrototypePatternDemo } from "./creational/prototype.js";
export { SingletonPatternDemo } from "./creational/singleton.js";

// Structural
export { AdapterPatternDemo } from "./structural/adapter.js";
export { BridgePatternDemo } from "./structural/bridge.js";
export { CompositePatternDemo } from "./structural/composite.js";
export { DecoratorPatternDemo } from "./structural/decorator.js";
export { FacadePatternDemo } from "./structural/facade.js";
export { FlyweightPatternDemo } from "./structural/flyweight.js";
export { ProxyPatternDemo } from "./structural/proxy.js";

// Behavioral
export { ChainOfResponsibilityPatternDemo } from "./behavioral/chain-of-responsibility.js";
export { CommandPatternDemo } from "./behavioral/command.js";
export { InterpreterPatternDemo } from "./behavioral/interpreter.js";
export { IteratorPatternDemo } from "./behavioral/iterator.js";
export { MediatorPatternDemo } from "./behavioral/mediator.js";
export { MementoPatternDemo } from "./behavioral/memento.js";
export { ObserverPatternDemo } from "./behavioral/observer.js";
export { StatePatternDemo } from "./behavioral/state.js";
export { StrategyPatternDemo } from "./behavioral/strategy.js";
export { TemplateMethodPatternDemo } from "./behavioral/template-method.js";
export { VisitorPatternDemo } from "./behavioral/visitor.js";
