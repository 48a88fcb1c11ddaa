import {
  createConsoleLogger,
  createHostAddressResolver,
  HostAddrError,
} from "../src";

// Prints the contact address a protocol stack would advertise in its headers.
const resolver = createHostAddressResolver({
  logger: createConsoleLogger("contact"),
});

try {
  console.log(`one: ${resolver.oneAddress()}`);
  console.log(`all: ${resolver.allAddresses().join(", ")}`);
} catch (err) {
  if (err instanceof HostAddrError) {
    console.error(`${err.code}: ${err.message}`);
    process.exitCode = 1;
  } else {
    throw err;
  }
}
