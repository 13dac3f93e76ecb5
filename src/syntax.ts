/**
 * arbor-dom — Reserved names, namespace URIs and DOM feature strings
 */

// ---------------------------------------------------------------------------
// Namespaces
// ---------------------------------------------------------------------------

export const XML_NS = 'http://www.w3.org/XML/1998/namespace';
export const XMLNS_NS = 'http://www.w3.org/2000/xmlns/';

export const XML_PREFIX = 'xml';
export const XMLNS_PREFIX = 'xmlns';

// ---------------------------------------------------------------------------
// Names of nodes that have no markup name
// ---------------------------------------------------------------------------

export const TEXT_NODE_NAME = '#text';
export const CDATA_NODE_NAME = '#cdata-section';
export const COMMENT_NODE_NAME = '#comment';
export const DOCUMENT_NODE_NAME = '#document';
export const FRAGMENT_NODE_NAME = '#document-fragment';

export type SpecialNodeName = typeof TEXT_NODE_NAME | typeof CDATA_NODE_NAME | typeof COMMENT_NODE_NAME | typeof DOCUMENT_NODE_NAME | typeof FRAGMENT_NODE_NAME;

// ---------------------------------------------------------------------------
// Features
// ---------------------------------------------------------------------------

export const FEATURE_CORE = 'Core';
export const FEATURE_XML = 'XML';
export const FEATURE_V1 = '1.0';
export const FEATURE_V2 = '2.0';

/** The (feature, version) pairs this implementation answers `true` for. */
const SUPPORTED_FEATURES: ReadonlyArray<readonly [string, string]> = [
	[FEATURE_CORE, FEATURE_V1],
	[FEATURE_XML, FEATURE_V1],
	[FEATURE_CORE, FEATURE_V2],
];

export function isFeatureSupported(feature: string, version: string): boolean {
	return SUPPORTED_FEATURES.some(([f, v]) => f === feature && v === version);
}
