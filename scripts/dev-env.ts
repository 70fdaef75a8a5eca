import { randomBytes } from "node:crypto";
import { Wallet } from "ethers";
import { publicKeyFromPrivateKeyHex, randomPrivateKeyHex } from "@cxt/shared";

async function main() {
  const signingKeyHex = randomPrivateKeyHex();
  const inputSigner = await publicKeyFromPrivateKeyHex(signingKeyHex);
  const tracker = Wallet.createRandom();
  const serviceToken = randomBytes(24).toString("hex");

  // Print env-ready output so it can be copied into both services' config.
  console.log(`COPROCESSOR_SIGNING_KEY_HEX=${signingKeyHex}`);
  console.log(`# input signer public key: ${inputSigner}`);
  console.log(`TRACKER_ADDRESS=${tracker.address}`);
  console.log(`SERVICE_AUTH_TOKEN=${serviceToken}`);
  console.log("COPROCESSOR_URL=http://127.0.0.1:4202");
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
