import { Keypair } from "@solana/web3.js";
import { expect } from "chai";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { setTimeout as delay } from "timers/promises";
import * as init from "../sdk/cli/src/commands/init";
import * as mint from "../sdk/cli/src/commands/mint";
import { amountArg, loadKeypair, loadToken, runTokenCommand, saveToken, withStateLock } from "../sdk/cli/src/config";
import { TokenError, TokenErrorCode } from "../sdk/core/src";
import { deploy, newAccount } from "./helpers";

function writeKeypair(dir: string, name: string): Keypair {
  const keypair = Keypair.generate();
  fs.writeFileSync(path.join(dir, name), JSON.stringify(Array.from(keypair.secretKey)));
  return keypair;
}

describe("CLI", () => {
  let dir: string;
  let errors: string[];
  const originalLog = console.log;
  const originalError = console.error;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "guarded-token-"));
    errors = [];
    console.log = () => undefined;
    console.error = (message: string) => {
      errors.push(message);
    };
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
    process.exitCode = undefined;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads a keypair file", () => {
    const keypair = writeKeypair(dir, "id.json");
    expect(loadKeypair(path.join(dir, "id.json")).publicKey.equals(keypair.publicKey)).to.equal(true);
  });

  it("rejects a keypair file that is not a byte array", () => {
    const file = path.join(dir, "bad.json");
    fs.writeFileSync(file, JSON.stringify({ secret: "test-secret" }));
    expect(() => loadKeypair(file)).to.throw(`Keypair file ${file} must contain a JSON array of numbers`);
  });

  it("saves and reloads token state", () => {
    const admin = newAccount();
    const token = deploy(admin, { decimals: 6, initialSupply: 1_500_000n });
    const file = path.join(dir, "nested", "state.json");
    saveToken(file, token);

    const reloaded = loadToken(file);
    expect(reloaded.address.equals(token.address)).to.equal(true);
    expect(reloaded.balanceOf(admin)).to.equal(1_500_000n);
    expect(fs.readFileSync(file, "utf-8").endsWith("}\n")).to.equal(true);
  });

  it("reports a missing state file", () => {
    const file = path.join(dir, "missing.json");
    expect(() => loadToken(file)).to.throw(`No token state at ${file}. Run \`guarded-token init\` first.`);
  });

  it("parses amounts with the token's decimals", () => {
    const token = deploy(newAccount(), { decimals: 6 });
    expect(amountArg(token, "2.5")).to.equal(2_500_000n);
  });

  it("replaces the state file without leaving a temp file", () => {
    const file = path.join(dir, "state.json");
    saveToken(file, deploy(newAccount(), { initialSupply: 1n }));
    saveToken(file, deploy(newAccount(), { initialSupply: 2n }));
    expect(loadToken(file).totalSupply()).to.equal(2n);
    expect(fs.readdirSync(dir)).to.deep.equal(["state.json"]);
  });

  it("waits for a held state lock", async () => {
    const file = path.join(dir, "state.json");
    fs.writeFileSync(`${file}.lock`, "12345");
    const pending = withStateLock(file, () => "done");

    await delay(60);
    expect(fs.existsSync(`${file}.lock`)).to.equal(true);
    fs.rmSync(`${file}.lock`);

    expect(await pending).to.equal("done");
    expect(fs.existsSync(`${file}.lock`)).to.equal(false);
  });

  it("releases the state lock when the body throws", async () => {
    const file = path.join(dir, "state.json");
    let thrown: unknown;
    try {
      await withStateLock(file, () => {
        throw new Error("disk full");
      });
    } catch (err) {
      thrown = err;
    }
    expect(thrown).to.be.instanceOf(Error);
    expect(fs.existsSync(`${file}.lock`)).to.equal(false);
  });

  it("reports token errors with their number and sets the exit code", async () => {
    await runTokenCommand(() => {
      throw new TokenError(TokenErrorCode.Paused);
    });
    expect(errors).to.deep.equal(["Error 6001 (Paused): Token is paused"]);
    expect(process.exitCode).to.equal(1);
  });

  it("rethrows other errors", async () => {
    let thrown: unknown;
    try {
      await runTokenCommand(() => {
        throw new Error("disk full");
      });
    } catch (err) {
      thrown = err;
    }
    expect(thrown).to.be.instanceOf(Error).with.property("message", "disk full");
    expect(process.exitCode).to.equal(undefined);
  });

  describe("commands", () => {
    const base = { _: [], $0: "guarded-token" };

    it("init then mint updates the state file", async () => {
      const deployer = writeKeypair(dir, "deployer.json");
      const recipient = newAccount();
      const state = path.join(dir, "state.json");
      const keypair = path.join(dir, "deployer.json");

      await init.handler({ ...base, keypair, state, name: "Cli Token", symbol: "CLI", decimals: 2, supply: "10", cap: undefined });
      await mint.handler({ ...base, keypair, state, to: recipient.toBase58(), amount: "2.5" });

      const token = loadToken(state);
      expect(token.symbol).to.equal("CLI");
      expect(token.balanceOf(deployer.publicKey)).to.equal(1_000n);
      expect(token.balanceOf(recipient)).to.equal(250n);
      expect(token.totalSupply()).to.equal(1_250n);
      expect(process.exitCode).to.equal(undefined);
      expect(fs.readdirSync(dir).sort()).to.deep.equal(["deployer.json", "state.json"]);
    });

    it("keeps every change from overlapping commands", async () => {
      writeKeypair(dir, "deployer.json");
      const keypair = path.join(dir, "deployer.json");
      const state = path.join(dir, "state.json");
      const recipient = newAccount().toBase58();
      await init.handler({ ...base, keypair, state, name: "Cli Token", symbol: "CLI", decimals: 0, supply: "5", cap: undefined });

      await Promise.all([
        mint.handler({ ...base, keypair, state, to: recipient, amount: "5" }),
        mint.handler({ ...base, keypair, state, to: recipient, amount: "7" }),
      ]);

      expect(loadToken(state).totalSupply()).to.equal(17n);
      expect(process.exitCode).to.equal(undefined);
    });

    it("init refuses to overwrite existing state", async () => {
      writeKeypair(dir, "deployer.json");
      const state = path.join(dir, "state.json");
      const args = {
        ...base,
        keypair: path.join(dir, "deployer.json"),
        state,
        name: "Cli Token",
        symbol: "CLI",
        decimals: 0,
        supply: "1",
        cap: undefined,
      };
      await init.handler(args);
      await init.handler(args);
      expect(errors).to.deep.equal([`Token state already exists at ${state}; refusing to overwrite.`]);
      expect(process.exitCode).to.equal(1);
    });

    it("mint without the minter role leaves the state unchanged", async () => {
      writeKeypair(dir, "deployer.json");
      const outsider = writeKeypair(dir, "outsider.json");
      const state = path.join(dir, "state.json");
      await init.handler({
        ...base,
        keypair: path.join(dir, "deployer.json"),
        state,
        name: "Cli Token",
        symbol: "CLI",
        decimals: 0,
        supply: "5",
        cap: undefined,
      });

      await mint.handler({ ...base, keypair: path.join(dir, "outsider.json"), state, to: newAccount().toBase58(), amount: "1" });
      expect(errors).to.deep.equal([
        `Error 6000 (Unauthorized): Caller lacks the required role: ${outsider.publicKey.toBase58()} is missing role "minter"`,
      ]);
      expect(process.exitCode).to.equal(1);
      expect(loadToken(state).totalSupply()).to.equal(5n);
    });
  });
});
