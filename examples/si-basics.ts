import { Console, Effect } from "effect"
import { UnitSystem } from "../src/UnitSystem.js"

const program = Effect.gen(function* () {
  const units = yield* UnitSystem

  const distance = yield* units.quantity(42.195, "km")
  const time = yield* units.quantity(2, "h")
  const speed = distance.dividedBy(time)
  yield* Console.log(`marathon pace: ${yield* units.convert(speed, "km/h")} km/h`)
  yield* Console.log(`formatted: ${yield* units.format(speed)}`)

  const energy = yield* units.evaluate("1500*kg*(20*m/s)**2/2")
  yield* Console.log(`kinetic energy: ${yield* units.format(energy, { precision: 4 })}`)
  yield* Console.log(`as LaTeX: ${yield* units.format(energy, { style: "latex", precision: 4 })}`)

  const body = yield* units.quantity(37, "degC")
  yield* Console.log(`body temperature: ${yield* units.convert(body, "degF")} degF`)
  yield* Console.log(`unicode: ${yield* units.format(body, { style: "unicode" })}`)

  const ratio = yield* units.evaluate("c*s/m")
  yield* Console.log(`c*s/m = ${yield* units.format(ratio)}`)
}).pipe(Effect.provide(UnitSystem.Default))

Effect.runPromise(program).catch((error) => {
  console.error("Failed to run the SI example", error)
  process.exitCode = 1
})
