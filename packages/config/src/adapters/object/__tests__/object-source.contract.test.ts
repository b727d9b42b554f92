import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  make: () =>
    new ObjectSource({ server: { tls: { enabled: true } }, "server.port": 8080, debug: true }),
  expected: { server: { port: 8080, tls: { enabled: true } }, debug: true },
})
