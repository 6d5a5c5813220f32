import { literal, namespace } from './terms.js';
import type { Literal } from '../types/index.js';

/**
 * Namespace IRIs bound in every serialized graph, in declaration order.
 */
export const PREFIXES = {
    rdf: 'http://www.w3.org/1999/02/22-rdf-syntax-ns#',
    rdfs: 'http://www.w3.org/2000/01/rdf-schema#',
    xsd: 'http://www.w3.org/2001/XMLSchema#',
    foaf: 'http://xmlns.com/foaf/0.1/',
    vivo: 'http://vivoweb.org/ontology/core#',
    bibo: 'http://purl.org/ontology/bibo/',
    vcard: 'http://www.w3.org/2006/vcard/ns#',
    obo: 'http://purl.obolibrary.org/obo/',
} as const;

const rdf = namespace(PREFIXES.rdf);
const rdfs = namespace(PREFIXES.rdfs);
const xsd = namespace(PREFIXES.xsd);
const foaf = namespace(PREFIXES.foaf);
const vivo = namespace(PREFIXES.vivo);
const bibo = namespace(PREFIXES.bibo);

export const RDF = {
    type: rdf('type'),
} as const;

export const RDFS = {
    label: rdfs('label'),
} as const;

export const XSD = {
    integer: xsd('integer'),
    dateTime: xsd('dateTime'),
} as const;

export const FOAF = {
    Person: foaf('Person'),
    Organization: foaf('Organization'),
    name: foaf('name'),
} as const;

export const BIBO = {
    AcademicArticle: bibo('AcademicArticle'),
    doi: bibo('doi'),
    title: bibo('title'),
    abstract: bibo('abstract'),
    pmid: bibo('pmid'),
    issn: bibo('issn'),
} as const;

export const VIVO = {
    InformationResource: vivo('InformationResource'),
    Authorship: vivo('Authorship'),
    Position: vivo('Position'),
    DateTimeValue: vivo('DateTimeValue'),
    relates: vivo('relates'),
    rank: vivo('rank'),
    orcidId: vivo('orcidId'),
    dateTime: vivo('dateTime'),
    dateTimeValue: vivo('dateTimeValue'),
    dateTimePrecision: vivo('dateTimePrecision'),
    yearPrecision: vivo('yearPrecision'),
    sciteSupportingCites: vivo('sciteSupportingCites'),
    sciteContrastingCites: vivo('sciteContrastingCites'),
    sciteMentioningCites: vivo('sciteMentioningCites'),
    sciteTotalCites: vivo('sciteTotalCites'),
    sciteReportUrl: vivo('sciteReportUrl'),
} as const;

export function integerLiteral(value: number): Literal {
    return literal(String(value), XSD.integer);
}

export function dateTimeLiteral(value: string): Literal {
    return literal(value, XSD.dateTime);
}
