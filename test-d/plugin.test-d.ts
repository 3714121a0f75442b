import { expectAssignable, expectNotAssignable, expectType } from 'tsd';
import {
  KeyedStore,
  Pluggable,
  compute,
  defineFalliblePlugin,
  defineKey,
  definePlugin,
  get,
  getMut,
  getRef,
  intoOk,
  ok,
  type Extensible,
  type Infallible,
  type Result,
  type Slot,
  type StoreKey,
} from '../src/index';

class Host implements Extensible {
  readonly extensions = new KeyedStore();
  name = 'host';
}

declare const host: Host;

// Optional strategy: absence is the only failure signal
const Name = definePlugin({ name: 'Name', evaluate: (h: Host) => h.name });
expectType<string | undefined>(get(host, Name));
expectType<Readonly<string> | undefined>(getRef(host, Name));
expectType<Slot<string> | undefined>(getMut(host, Name));
expectType<string | undefined>(compute(host, Name));

// Explicit-error strategy
const Parsed = defineFalliblePlugin<Host, number, 'empty' | 'nan'>({
  name: 'Parsed',
  evaluate: () => ok(1),
});
expectType<Result<number, 'empty' | 'nan'>>(get(host, Parsed));
expectType<Result<Slot<number>, 'empty' | 'nan'>>(getMut(host, Parsed));

// An uninhabited error type leaves the failure arm unreachable
const Always = defineFalliblePlugin<Host, number, Infallible>({
  name: 'Always',
  evaluate: () => ok(7),
});
const always = get(host, Always);
expectType<Result<number, never>>(always);
if (!always.ok) {
  expectType<never>(always.error);
}
expectType<number>(intoOk(always));
expectNotAssignable<Parameters<typeof intoOk>[0]>(get(host, Parsed));

// A key is bound to one value type
const Count = defineKey<number>('Count');
expectType<StoreKey<number>>(Count);
expectNotAssignable<StoreKey<string>>(Count);
const store = new KeyedStore();
expectType<Readonly<number> | undefined>(store.get(Count));

// Plugins are keys of their result type
expectAssignable<StoreKey<string>>(Name);

// Methods on Pluggable hosts take plugins typed against the subclass
class Route extends Pluggable {
  path = '/';
}
const Path = definePlugin({ name: 'Path', evaluate: (r: Route) => r.path });
declare const route: Route;
expectType<string | undefined>(route.get(Path));
expectType<Result<number, Infallible>>(
  route.get(
    defineFalliblePlugin<Route, number, Infallible>({
      name: 'Depth',
      evaluate: (r) => ok(r.path.split('/').length),
    })
  )
);
