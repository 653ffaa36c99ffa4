import { MemoryBuffer } from "../src/buffer";
import { SingleCharTokenizer } from "../src/tokenizer";
import { performValidation } from "../src/validation";

const tk = new SingleCharTokenizer();
const validator = { isValid: (t: string) => t === t.trim(), fixText: (t: string) => t.trim() };
const list = Array.from({ length: 2000 }, (_, i) => (i % 7 === 0 ? " value" + i + " " : "value" + i)).join(";");

const t0 = performance.now();
for (let i = 0; i < 20; i++) performValidation(new MemoryBuffer(list), tk, validator);
const dt = performance.now() - t0;
console.log(`bench_validation ms: ${dt.toFixed(2)}`);
