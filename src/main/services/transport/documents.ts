/** GraphQL documents sent by the transport gateway. */

export const CREATE_INFERENCE_MUTATION = `
  mutation CreateInference($input: CreateInferenceInput!) {
    createInference(input: $input) {
      ... on Inference {
        id
        status
        createdAt
      }
      ... on Error {
        message
      }
    }
  }
`

export const GET_INFERENCE_STATUS_QUERY = `
  query GetInferenceStatus($input: GetInferencesByIdInput!) {
    getInferencesById(input: $input) {
      ... on InferencesResult {
        inferences {
          id
          status
          files {
            id
            url
            name
          }
        }
      }
      ... on Error {
        message
      }
    }
  }
`
