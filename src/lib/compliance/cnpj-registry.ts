/**
 * @file    cnpj-registry.ts
 * @purpose Optional lookup of a CNPJ in the public ReceitaWS registry, run only
 *          after the local checksum passes. Disabled unless CNPJ_REGISTRY_LOOKUP=true.
 * @deps    axios, zod
 */

import axios from "axios";
import { z } from "zod";
import { errorMessage } from "../errors";
import { cleanCnpj, formatCnpj, validateCnpj } from "./cnpj";

const RECEITAWS_URL = "https://www.receitaws.com.br/v1/cnpj";

export const RegistryResultSchema = z.object({
    valid: z.boolean(),
    error: z.string().optional(),
    cnpj: z.string().optional(),
    legalName: z.string().nullable().optional(),
    tradeName: z.string().nullable().optional(),
    status: z.string().nullable().optional(),
    address: z.string().nullable().optional(),
    city: z.string().nullable().optional(),
    state: z.string().nullable().optional(),
    postalCode: z.string().nullable().optional(),
});

export type RegistryResult = z.infer<typeof RegistryResultSchema>;

export interface CnpjRegistry {
    lookup(cnpj: string): Promise<RegistryResult>;
}

const ReceitaResponseSchema = z.object({
    status: z.string().optional(),
    message: z.string().optional(),
    nome: z.string().optional(),
    fantasia: z.string().optional(),
    situacao: z.string().optional(),
    logradouro: z.string().optional(),
    numero: z.string().optional(),
    municipio: z.string().optional(),
    uf: z.string().optional(),
    cep: z.string().optional(),
});

export class ReceitaWsRegistry implements CnpjRegistry {
    constructor(private readonly timeoutMs = 10_000) {}

    async lookup(cnpj: string): Promise<RegistryResult> {
        const digits = cleanCnpj(cnpj);
        if (!validateCnpj(digits)) {
            return { valid: false, error: "Invalid CNPJ format" };
        }

        try {
            const response = await axios.get(`${RECEITAWS_URL}/${digits}`, {
                timeout: this.timeoutMs,
                validateStatus: () => true,
            });

            if (response.status !== 200) {
                return { valid: false, error: `Registry returned status ${response.status}` };
            }

            const data = ReceitaResponseSchema.parse(response.data);
            if (data.status === "ERROR") {
                return { valid: false, error: data.message ?? "Registry rejected the CNPJ" };
            }

            return {
                valid: true,
                cnpj: formatCnpj(digits),
                legalName: data.nome ?? null,
                tradeName: data.fantasia ?? null,
                status: data.situacao ?? null,
                address: [data.logradouro, data.numero].filter(Boolean).join(", ") || null,
                city: data.municipio ?? null,
                state: data.uf ?? null,
                postalCode: data.cep ?? null,
            };
        } catch (err) {
            return { valid: false, error: `Registry lookup failed: ${errorMessage(err)}` };
        }
    }
}
